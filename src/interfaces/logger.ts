/**
 * Output verbosity levels, selected by --quiet and --verbose
 */
export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}
