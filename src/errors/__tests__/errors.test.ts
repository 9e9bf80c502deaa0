/**
 * Tests for the error types and error reporting
 */

import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  WalkError,
  SinkError,
  ScanAbortedError,
  describeError,
  formatError,
  getExitCode,
  handleError,
  toError,
} from '../index.js';

/** A file system error shaped like the ones node:fs rejects with */
function fsError(code: string, text: string): Error {
  return Object.assign(new Error(`${code}: ${text}`), { code });
}

const WALK_HINT = 'Check that the directory exists and is readable';
const SINK_HINT = 'The scan stopped feeding new files; results so far were kept';

beforeAll(() => {
  chalk.level = 0;
});

describe('scanner errors', () => {
  it('WalkError names the directory and the file system error', () => {
    const cause = fsError('EACCES', "permission denied, scandir '/p/b'");
    const error = new WalkError('/p/b', cause);

    expect(error.message).toBe("Failed to walk /p/b: EACCES: permission denied, scandir '/p/b'");
    expect(error.hint).toBe(WALK_HINT);
    expect(error.path).toBe('/p/b');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe(6);
    expect(error.name).toBe('WalkError');
  });

  it('WalkError works without a cause', () => {
    expect(new WalkError('/p').message).toBe('Failed to walk /p');
  });

  it('SinkError names the file being delivered', () => {
    const error = new SinkError('/p/a.go', new Error('disk full'));

    expect(error.message).toBe('File sink failed for /p/a.go: disk full');
    expect(error.hint).toBe(SINK_HINT);
    expect(error.path).toBe('/p/a.go');
    expect(error.code).toBe(7);
  });

  it('ScanAbortedError looks like a standard abort', () => {
    const error = new ScanAbortedError('/p');

    expect(error.message).toBe('Scan of /p was aborted');
    expect(error.name).toBe('AbortError');
    expect(error.hint).toBeUndefined();
    expect(error.code).toBe(130);
  });

  it('every scanner and CLI error is a CLIError', () => {
    const errors = [
      new FileNotFoundError('/p'),
      new ConfigError('bad'),
      new ValidationError('bad'),
      new WalkError('/p'),
      new SinkError('/p'),
      new ScanAbortedError('/p'),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(CLIError);
      expect(error).toBeInstanceOf(Error);
    }
  });
});

describe('CLI errors', () => {
  it('FileNotFoundError exits with 3', () => {
    const error = new FileNotFoundError('/nope');

    expect(error.message).toBe('Path does not exist: /nope');
    expect(error.code).toBe(3);
  });

  it('ConfigError points at config list unless given a hint', () => {
    expect(new ConfigError('Unknown key').hint).toBe('Run: lens config list  to see valid options');
    expect(new ConfigError('Unknown key', 'Use scan.workers').hint).toBe('Use scan.workers');
  });

  it('ValidationError lists its issues in the hint', () => {
    const error = new ValidationError('Invalid scan configuration', [
      'root: root must not be empty',
      'allowedExtensions.0: extensions must start with "."',
    ]);

    expect(error.hint).toBe(
      'Issues:\n  root: root must not be empty\n  allowedExtensions.0: extensions must start with "."'
    );
    expect(new ValidationError('Invalid').hint).toBe('Check your input and try again');
  });
});

describe('toError', () => {
  it('keeps errors and wraps anything else', () => {
    const error = new Error('x');

    expect(toError(error)).toBe(error);
    expect(toError('plain')).toMatchObject({ message: 'plain' });
  });
});

describe('describeError', () => {
  it('reports the path and errno code of a walk failure', () => {
    const error = new WalkError('/p/b', fsError('EACCES', "permission denied, scandir '/p/b'"));

    expect(describeError(error)).toEqual({
      error: "Failed to walk /p/b: EACCES: permission denied, scandir '/p/b'",
      code: 6,
      hint: WALK_HINT,
      path: '/p/b',
      cause: 'EACCES',
    });
  });

  it('reports the error name when a sink cause has no errno code', () => {
    const report = describeError(new SinkError('/p/a.go', new TypeError('not a buffer')));

    expect(report.path).toBe('/p/a.go');
    expect(report.cause).toBe('TypeError');
  });

  it('reports a cancelled scan without hint or stack', () => {
    expect(describeError(new ScanAbortedError('/p'), true)).toEqual({
      error: 'Scan of /p was aborted',
      code: 130,
      aborted: true,
    });
  });

  it('lists validation issues', () => {
    const report = describeError(new ValidationError('Invalid worker count', ['workerCount: 0']));

    expect(report.issues).toEqual(['workerCount: 0']);
  });

  it('suggests --verbose for unexpected errors, and gives the stack with it', () => {
    const error = new Error('Something broke');

    expect(describeError(error)).toEqual({
      error: 'Something broke',
      code: 1,
      hint: 'Run with --verbose for more details',
    });
    expect(describeError(error, true)).toEqual({
      error: 'Something broke',
      code: 1,
      stack: error.stack,
    });
  });

  it('reports thrown non-errors as strings', () => {
    expect(describeError(42)).toEqual({ error: '42', code: 1 });
  });
});

describe('formatError', () => {
  describe('text output', () => {
    it('shows the path and cause of a walk failure', () => {
      const error = new WalkError('/p/b', fsError('EACCES', "permission denied, scandir '/p/b'"));

      expect(formatError(error)).toBe(
        [
          "Error: Failed to walk /p/b: EACCES: permission denied, scandir '/p/b'",
          '  Path:  /p/b',
          '  Cause: EACCES',
          `Hint: ${WALK_HINT}`,
        ].join('\n')
      );
    });

    it('leaves out the cause line when there is none', () => {
      expect(formatError(new WalkError('/p'))).toBe(
        `Error: Failed to walk /p\n  Path:  /p\nHint: ${WALK_HINT}`
      );
    });

    it('shows the file a sink failed on', () => {
      expect(formatError(new SinkError('/p/a.go', new Error('disk full')))).toBe(
        [
          'Error: File sink failed for /p/a.go: disk full',
          '  Path:  /p/a.go',
          '  Cause: Error',
          `Hint: ${SINK_HINT}`,
        ].join('\n')
      );
    });

    it('prints a single line for a cancelled scan', () => {
      expect(formatError(new ScanAbortedError('/p'), { verbose: true })).toBe(
        'Cancelled: Scan of /p was aborted'
      );
    });

    it('prints only the message for a CLIError without hint', () => {
      expect(formatError(new CLIError('Unknown command: foo'))).toBe('Error: Unknown command: foo');
    });

    it('adds the stack trace in verbose mode', () => {
      const error = new CLIError('Failed');
      const lines = formatError(error, { verbose: true }).split('\n');

      expect(lines.slice(0, 3)).toEqual(['Error: Failed', '', 'Stack trace:']);
      expect(lines.slice(3).join('\n')).toBe(error.stack);
    });

    it('formats thrown non-errors', () => {
      expect(formatError('string error')).toBe('Error: string error');
    });
  });

  describe('JSON output', () => {
    it('includes path and cause for scanner errors', () => {
      const error = new WalkError('/missing', fsError('ENOENT', 'no such file or directory'));

      expect(JSON.parse(formatError(error, { json: true }))).toEqual({
        error: 'Failed to walk /missing: ENOENT: no such file or directory',
        code: 6,
        hint: WALK_HINT,
        path: '/missing',
        cause: 'ENOENT',
      });
    });

    it('marks a cancelled scan', () => {
      expect(JSON.parse(formatError(new ScanAbortedError('/p'), { json: true }))).toEqual({
        error: 'Scan of /p was aborted',
        code: 130,
        aborted: true,
      });
    });

    it('includes the stack in verbose mode', () => {
      const error = new ConfigError('Bad config', 'Fix it');
      const parsed = JSON.parse(formatError(error, { json: true, verbose: true }));

      expect(parsed.hint).toBe('Fix it');
      expect(parsed.stack).toBe(error.stack);
    });
  });
});

describe('getExitCode', () => {
  it('uses the code of a CLIError and 1 otherwise', () => {
    expect(getExitCode(new WalkError('/x'))).toBe(6);
    expect(getExitCode(new SinkError('/x'))).toBe(7);
    expect(getExitCode(new ScanAbortedError('/x'))).toBe(130);
    expect(getExitCode(new Error('x'))).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the formatted error and exits with its code', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`exit ${code}`);
    });

    expect(() => handleError(new SinkError('/p/a.go'), { json: true })).toThrow('exit 7');
    expect(errorSpy).toHaveBeenCalledWith(
      JSON.stringify(
        {
          error: 'File sink failed for /p/a.go',
          code: 7,
          hint: SINK_HINT,
          path: '/p/a.go',
        },
        null,
        2
      )
    );
  });
});
