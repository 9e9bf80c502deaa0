/**
 * Tests for ignore file handling
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { loadIgnoreFile, parseIgnoreContent } from '../ignore.js';

// Mock fs module
vi.mock('node:fs', () => ({
  readFileSync: vi.fn(),
}));

describe('parseIgnoreContent', () => {
  it('parses simple patterns', () => {
    const content = `
*.log
*_test.go
secret?.ts
`;
    expect(parseIgnoreContent(content)).toEqual(['*.log', '*_test.go', 'secret?.ts']);
  });

  it('skips empty lines', () => {
    const content = `
*.log

*.tmp

`;
    expect(parseIgnoreContent(content)).toEqual(['*.log', '*.tmp']);
  });

  it('skips comment lines', () => {
    const content = `
# Build output
*.min.js
# Generated
*.pb.go
`;
    expect(parseIgnoreContent(content)).toEqual(['*.min.js', '*.pb.go']);
  });

  it('trims whitespace and handles CRLF line endings', () => {
    const content = '  *.log  \r\n\tdist\r\n';
    expect(parseIgnoreContent(content)).toEqual(['*.log', 'dist']);
  });

  it('keeps lines that only look special literally', () => {
    const content = '!keep.ts\n/rooted.ts\nbuild/\n';
    expect(parseIgnoreContent(content)).toEqual(['!keep.ts', '/rooted.ts', 'build/']);
  });

  it('treats an indented # line as a comment after trimming', () => {
    expect(parseIgnoreContent('   # note\n*.bak')).toEqual(['*.bak']);
  });
});

describe('loadIgnoreFile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns parsed patterns when the file can be read', () => {
    vi.mocked(readFileSync).mockReturnValue('*.log\n# comment\n*.tmp\n');

    expect(loadIgnoreFile('/project/.gitignore')).toEqual(['*.log', '*.tmp']);
    expect(readFileSync).toHaveBeenCalledWith('/project/.gitignore', 'utf-8');
  });

  it('returns an empty array when the file is missing', () => {
    vi.mocked(readFileSync).mockImplementation(() => {
      throw Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
    });

    expect(loadIgnoreFile('/project/.gitignore')).toEqual([]);
  });

  it('returns an empty array when the file cannot be read', () => {
    vi.mocked(readFileSync).mockImplementation(() => {
      throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    });

    expect(loadIgnoreFile('/project/.gitignore')).toEqual([]);
  });

  it('reports a skipped file to the logger at debug level', () => {
    vi.mocked(readFileSync).mockImplementation(() => {
      throw new Error('ENOENT: no such file or directory');
    });
    const logger = { warn: vi.fn(), debug: vi.fn() };

    loadIgnoreFile('/project/.gitignore', logger);

    expect(logger.debug).toHaveBeenCalledWith(
      'No ignore patterns loaded from /project/.gitignore (ENOENT: no such file or directory)'
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('reports the pattern count to the logger', () => {
    vi.mocked(readFileSync).mockReturnValue('*.a\n*.b\n');
    const logger = { warn: vi.fn(), debug: vi.fn() };

    loadIgnoreFile('/project/.gitignore', logger);

    expect(logger.debug).toHaveBeenCalledWith(
      'Loaded 2 ignore pattern(s) from /project/.gitignore'
    );
  });
});
