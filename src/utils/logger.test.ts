/**
 * Tests for Logger Utilities
 */

import chalk from 'chalk';
import * as logger from './logger';
import { Verbosity } from '../interfaces/logger';

describe('Logger Utilities', () => {
  let stdoutOutput: string[];
  let stderrOutput: string[];
  let stdoutSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;

  beforeEach(() => {
    stdoutOutput = [];
    stderrOutput = [];

    stdoutSpy = jest
      .spyOn(process.stdout, 'write')
      .mockImplementation((chunk: string | Uint8Array) => {
        stdoutOutput.push(String(chunk));
        return true;
      });
    stderrSpy = jest
      .spyOn(process.stderr, 'write')
      .mockImplementation((chunk: string | Uint8Array) => {
        stderrOutput.push(String(chunk));
        return true;
      });
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
  });

  describe('Verbosity Levels', () => {
    it('should define the correct verbosity levels', () => {
      expect(Verbosity.Quiet).toBe(0);
      expect(Verbosity.Normal).toBe(1);
      expect(Verbosity.Verbose).toBe(2);
    });

    it('should resolve the level from the CLI flags', () => {
      expect(logger.resolveVerbosity({})).toBe(Verbosity.Normal);
      expect(logger.resolveVerbosity({ verbose: true })).toBe(Verbosity.Verbose);
      expect(logger.resolveVerbosity({ quiet: true, verbose: true })).toBe(
        Verbosity.Quiet,
      );
    });
  });

  describe('Color helpers', () => {
    it('should delegate to chalk', () => {
      expect(logger.red('error')).toBe(chalk.red('error'));
      expect(logger.green('ok')).toBe(chalk.green('ok'));
      expect(logger.bold('title')).toBe(chalk.bold('title'));
    });
  });

  describe('log', () => {
    it('should write when the level is within the current verbosity', () => {
      logger.log('Test message', Verbosity.Normal, Verbosity.Normal);

      expect(stdoutOutput).toEqual(['Test message\n']);
    });

    it('should not write when the level is above the current verbosity', () => {
      logger.log('Hidden message', Verbosity.Verbose, Verbosity.Normal);

      expect(stdoutOutput).toEqual([]);
    });

    it('should not append a second newline', () => {
      logger.log('Line\n', Verbosity.Normal, Verbosity.Normal);

      expect(stdoutOutput).toEqual(['Line\n']);
    });

    it('should suppress repeated messages when duplicates are not allowed', () => {
      logger.log('Repeated once', Verbosity.Normal, Verbosity.Normal, false);
      logger.log('Repeated once', Verbosity.Normal, Verbosity.Normal, false);

      expect(stdoutOutput).toEqual(['Repeated once\n']);
    });
  });

  describe('error', () => {
    it('should write errors to stderr even in quiet mode', () => {
      logger.error('Error message');

      expect(stdoutOutput).toEqual([]);
      expect(stderrOutput).toHaveLength(1);
      expect(stderrOutput[0]).toContain('Error message');
    });
  });

  describe('warning', () => {
    it('should write warnings at normal verbosity', () => {
      logger.warning('Warning message', Verbosity.Normal);

      expect(stdoutOutput).toHaveLength(1);
      expect(stdoutOutput[0]).toContain('Warning message');
    });

    it('should not write warnings in quiet mode', () => {
      logger.warning('Quiet warning', Verbosity.Quiet);

      expect(stdoutOutput).toEqual([]);
    });
  });

  describe('verbose', () => {
    it('should only write in verbose mode', () => {
      logger.verbose('Detail', Verbosity.Normal);
      logger.verbose('Detail', Verbosity.Verbose);

      expect(stdoutOutput).toEqual(['Detail\n']);
    });
  });

  describe('always', () => {
    it('should write regardless of verbosity', () => {
      logger.always('Summary line');

      expect(stdoutOutput).toEqual(['Summary line\n']);
    });
  });
});
