/**
 * Tests for the context collector sink
 */

import { describe, it, expect } from 'vitest';
import { createContextCollector } from '../collector.js';

const buf = (text: string) => Buffer.from(text, 'utf-8');

describe('createContextCollector', () => {
  it('stores delivered files', async () => {
    const collector = createContextCollector();

    await collector.sink('/p/a.ts', buf('const a = 1;'));
    await collector.sink('/p/b.ts', buf('b'));

    expect(collector.count).toBe(2);
    expect(collector.bytes).toBe(13);
    expect(collector.skipped).toBe(0);
  });

  it('returns records sorted by path regardless of arrival order', async () => {
    const collector = createContextCollector();

    await collector.sink('/p/z.ts', buf('z'));
    await collector.sink('/p/a/b.ts', buf('ab'));
    await collector.sink('/p/m.ts', buf('m'));

    expect(collector.records().map((r) => r.path)).toEqual(['/p/a/b.ts', '/p/m.ts', '/p/z.ts']);
  });

  it('shows paths relative to the root', async () => {
    const collector = createContextCollector({ root: '/p' });

    await collector.sink('/p/src/a.ts', buf('a'));
    await collector.sink('/p/b.ts', buf('b'));

    expect(collector.paths()).toEqual(['b.ts', 'src/a.ts']);
  });

  it('keeps the full path when the root is the file itself', async () => {
    const collector = createContextCollector({ root: '/p/only.ts' });

    await collector.sink('/p/only.ts', buf('x'));

    expect(collector.paths()).toEqual(['/p/only.ts']);
  });

  it('renders one block per file', async () => {
    const collector = createContextCollector({ root: '/p' });

    await collector.sink('/p/b.go', buf('package b'));
    await collector.sink('/p/a.go', buf('package a'));

    expect(collector.render()).toBe(
      '\n--- FILE: a.go ---\npackage a\n' + '\n--- FILE: b.go ---\npackage b\n'
    );
  });

  it('renders an empty string when nothing was collected', () => {
    expect(createContextCollector().render()).toBe('');
  });

  describe('maxBytes', () => {
    it('skips files that would exceed the budget', async () => {
      const collector = createContextCollector({ maxBytes: 10 });

      await collector.sink('/p/a', buf('123456'));
      await collector.sink('/p/b', buf('12345'));
      await collector.sink('/p/c', buf('1234'));

      expect(collector.records().map((r) => r.path)).toEqual(['/p/a', '/p/c']);
      expect(collector.bytes).toBe(10);
      expect(collector.skipped).toBe(1);
    });

    it('applies the budget in path order whatever the arrival order', async () => {
      const collector = createContextCollector({ maxBytes: 10 });

      await collector.sink('/p/c', buf('1234'));
      await collector.sink('/p/b', buf('12345'));
      await collector.sink('/p/a', buf('123456'));

      expect(collector.records().map((r) => r.path)).toEqual(['/p/a', '/p/c']);
      expect(collector.bytes).toBe(10);
      expect(collector.skipped).toBe(1);
    });

    it('updates the selection when more files arrive', async () => {
      const collector = createContextCollector({ maxBytes: 4 });

      await collector.sink('/p/b', buf('bbbb'));
      expect(collector.paths()).toEqual(['/p/b']);

      await collector.sink('/p/a', buf('aaa'));
      expect(collector.paths()).toEqual(['/p/a']);
      expect(collector.skipped).toBe(1);
      expect(collector.render()).toBe('\n--- FILE: /p/a ---\naaa\n');
    });

    it('keeps a file that fills the budget exactly', async () => {
      const collector = createContextCollector({ maxBytes: 3 });

      await collector.sink('/p/a', buf('abc'));

      expect(collector.count).toBe(1);
      expect(collector.skipped).toBe(0);
    });
  });
});
