import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../../utils/errors';
import { readJsonFile } from '../../utils/fs-utils';

export const CONFIG_FILENAME = 'config.json';

const DEFAULT_EXTENSIONS =
  '.arw,.cr3,.cr2,.nef,.raf,.dng,.tif,.jpg,.jpeg,.heic,.mp4,.mov';

/**
 * Lower-case an extension and give it a leading dot: "ARW" -> ".arw".
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  if (trimmed === '') {
    return '';
  }
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

const ExtensionListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => {
    const items = typeof value === 'string' ? value.split(',') : value;
    return items.map(normalizeExtension).filter((ext) => ext.length > 0);
  });

const OptionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const ConfigSchema = z.object({
  server: OptionalString.transform((value) =>
    value && !/^https?:\/\//.test(value) ? `https://${value}` : value,
  ),
  apiKey: OptionalString,
  sdVolume: OptionalString,
  ssdVolume: OptionalString,
  mirrorVolume: OptionalString,
  volumesRoot: z.string().min(1).default('/Volumes'),
  dumpInclude: ExtensionListSchema.default(DEFAULT_EXTENSIONS),
  dumpExclude: ExtensionListSchema.default(''),
  uploadInclude: ExtensionListSchema.default(DEFAULT_EXTENSIONS),
  uploadExclude: ExtensionListSchema.default(''),
  concurrentTasks: z.coerce.number().int().min(1).max(20).default(4),
  pauseJobs: z.boolean().default(true),
  hashWorkers: z.coerce.number().int().min(1).max(64).optional(),
});

export type PbakConfig = Readonly<z.infer<typeof ConfigSchema>> & {
  readonly stateDir: string;
};

export function configPath(stateDir: string): string {
  return path.join(stateDir, CONFIG_FILENAME);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build the configuration from a parsed JSON value plus environment overrides.
 */
export function parseConfig(
  raw: unknown,
  stateDir: string,
  env: NodeJS.ProcessEnv = {},
): PbakConfig {
  const base = typeof raw === 'object' && raw !== null ? raw : {};
  const withEnv = {
    ...base,
    ...(env.PBAK_IMMICH_SERVER ? { server: env.PBAK_IMMICH_SERVER } : {}),
    ...(env.PBAK_IMMICH_API_KEY ? { apiKey: env.PBAK_IMMICH_API_KEY } : {}),
  };

  const result = ConfigSchema.safeParse(withEnv);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath(stateDir)}: ${describeIssues(result.error)}`,
    );
  }
  return Object.freeze({ ...result.data, stateDir });
}

/**
 * Read `<stateDir>/config.json`. A missing file is fatal: the caller has
 * nothing to work with.
 */
export async function loadConfig(
  stateDir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PbakConfig> {
  const file = configPath(stateDir);
  let raw: unknown;
  try {
    raw = await readJsonFile(file);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read ${file}: ${message}`);
  }
  if (raw === undefined) {
    throw new ConfigError(
      `No configuration found at ${file}. Copy config.example.json there and edit it.`,
    );
  }
  return parseConfig(raw, stateDir, env);
}

/**
 * Uploading needs the server details; everything else works without them.
 */
export function requireServerConfig(
  config: PbakConfig,
): { server: string; apiKey: string } {
  const missing: string[] = [];
  if (!config.server) {
    missing.push('server');
  }
  if (!config.apiKey) {
    missing.push('apiKey');
  }
  if (!config.server || !config.apiKey) {
    throw new ConfigError(
      `Immich server details missing (${missing.join(', ')}) in ${configPath(config.stateDir)}.`,
    );
  }
  return { server: config.server, apiKey: config.apiKey };
}

export function archiveRoot(config: PbakConfig, ssdVolume: string): string {
  return path.join(config.volumesRoot, ssdVolume, 'full_dump');
}

export function sourceRoot(config: PbakConfig, sdVolume: string): string {
  return path.join(config.volumesRoot, sdVolume, 'DCIM');
}
