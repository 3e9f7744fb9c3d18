import { describe, it, expect, vi } from 'vitest';
import type { BoundingBox, Cursor, LeafContent } from '../types';
import { LevelSpec } from '../levels';
import { GroupingEngine, nest } from '../grouping';
import { KeyedLeafCursor } from '../adapters/keyed';
import type { KeyedGroup } from '../adapters/keyed';
import { InvalidLevelError, SessionConsumedError } from '../errors';

type Tree = string | Tree[];

interface ScriptLeaf {
  text: string;
  starts?: string[];
  ends?: string[];
}

/**
 * Cursor driven by a script of leaves. Records every query with the position
 * it was made at, and refuses queries once exhausted.
 */
class ScriptedCursor implements Cursor<string> {
  position = 0;
  advanceCalls = 0;
  queries: Array<{ op: string; level: string; position: number }> = [];

  constructor(private base: string, private leaves: ScriptLeaf[]) {}

  isEmpty(): boolean {
    return this.leaves.length === 0;
  }

  contentAt(level: string): LeafContent {
    const leaf = this.at('contentAt', level);
    const p = this.position;
    const box: BoundingBox = [[p, 0], [p + 1, 1]];
    return level === this.base
      ? { text: leaf.text, confidence: p, box }
      : { text: `${level}@${p}`, confidence: 50 + p, box };
  }

  isGroupStart(level: string): boolean {
    return this.at('isGroupStart', level).starts?.includes(level) ?? false;
  }

  isGroupEnd(level: string): boolean {
    return this.at('isGroupEnd', level).ends?.includes(level) ?? false;
  }

  advance(): boolean {
    this.advanceCalls++;
    this.position++;
    return this.position < this.leaves.length;
  }

  private at(op: string, level: string): ScriptLeaf {
    const leaf = this.leaves[this.position];
    if (!leaf) throw new Error(`${op}(${level}) after the last leaf`);
    this.queries.push({ op, level, position: this.position });
    return leaf;
  }
}

function leafTexts(nodes: Tree[]): string[] {
  return nodes.flatMap(n => (typeof n === 'string' ? [n] : leafTexts(n)));
}

function treeSpec(levels: string[]) {
  return new LevelSpec<string, Tree>(levels, {
    leaf: text => text,
    group: children => children,
  });
}

describe('GroupingEngine', () => {
  it('groups six words into two lines of three', () => {
    const cursor = new ScriptedCursor('word', [
      { text: 'w1', starts: ['line'] },
      { text: 'w2' },
      { text: 'w3', ends: ['line'] },
      { text: 'w4', starts: ['line'] },
      { text: 'w5' },
      { text: 'w6', ends: ['line'] },
    ]);

    const lines = nest(cursor, treeSpec(['line', 'word']));

    expect(lines).toEqual([
      ['w1', 'w2', 'w3'],
      ['w4', 'w5', 'w6'],
    ]);
  });

  it('nests a leaf that opens and closes every level at once', () => {
    const all = ['block', 'paragraph', 'line'];
    const cursor = new ScriptedCursor('word', [{ text: 'only', starts: all, ends: all }]);

    const blocks = nest(cursor, treeSpec(['block', 'paragraph', 'line', 'word']));

    expect(blocks).toEqual([[[['only']]]]);
  });

  it('closes the innermost group first when several end on one leaf', () => {
    const cursor = new ScriptedCursor('word', [
      { text: 'w1', starts: ['paragraph', 'line'] },
      { text: 'w2', ends: ['line'] },
      { text: 'w3', starts: ['line'], ends: ['line', 'paragraph'] },
      { text: 'w4', starts: ['paragraph', 'line'], ends: ['line', 'paragraph'] },
    ]);

    const paragraphs = nest(cursor, treeSpec(['paragraph', 'line', 'word']));

    expect(paragraphs).toEqual([
      [['w1', 'w2'], ['w3']],
      [['w4']],
    ]);
  });

  it('checks starts coarse to fine, then the leaf, then ends fine to coarse', () => {
    const all = ['paragraph', 'line'];
    const cursor = new ScriptedCursor('word', [{ text: 'w', starts: all, ends: all }]);

    nest(cursor, treeSpec(['paragraph', 'line', 'word']));

    expect(cursor.queries.map(q => `${q.op}:${q.level}`)).toEqual([
      'isGroupStart:paragraph',
      'isGroupStart:line',
      'contentAt:word',
      'isGroupEnd:line',
      'contentAt:line',
      'isGroupEnd:paragraph',
      'contentAt:paragraph',
    ]);
  });

  it('passes group text, box and confidence to the group boxer', () => {
    const group = vi.fn((children: string[], text: string) => `${text}:${children.join('')}`);
    const spec = new LevelSpec<string, string>(['line', 'word'], { leaf: text => text, group });
    const cursor = new ScriptedCursor('word', [
      { text: 'a', starts: ['line'] },
      { text: 'b', ends: ['line'] },
    ]);

    expect(nest(cursor, spec)).toEqual(['line@1:ab']);
    expect(group).toHaveBeenCalledTimes(1);
    expect(group).toHaveBeenCalledWith(['a', 'b'], 'line@1', [[1, 0], [2, 1]], 51);
  });

  it('returns an empty result for an empty cursor without boxing or advancing', () => {
    const leaf = vi.fn((text: string) => text);
    const spec = new LevelSpec<string, string>(['line', 'word'], { leaf, group: c => c.join(' ') });
    const cursor = new ScriptedCursor('word', []);

    expect(nest(cursor, spec)).toEqual([]);
    expect(leaf).not.toHaveBeenCalled();
    expect(cursor.advanceCalls).toBe(0);
    expect(cursor.queries).toEqual([]);
  });

  it('applies only the leaf boxer when the base level is the only level', () => {
    const leaf = vi.fn((text: string, confidence: number) => `${text}/${confidence}`);
    const spec = new LevelSpec<string, string>(['word'], { leaf });
    const cursor = new ScriptedCursor('word', [{ text: 'a' }, { text: 'b' }, { text: 'c' }]);

    expect(nest(cursor, spec)).toEqual(['a/0', 'b/1', 'c/2']);
    expect(cursor.queries.every(q => q.op === 'contentAt')).toBe(true);
  });

  it('advances once per leaf and never looks back', () => {
    const leaves: ScriptLeaf[] = [
      { text: 'w1', starts: ['line'] },
      { text: 'w2', ends: ['line'] },
      { text: 'w3', starts: ['line'] },
      { text: 'w4' },
      { text: 'w5', ends: ['line'] },
    ];
    const cursor = new ScriptedCursor('word', leaves);

    nest(cursor, treeSpec(['line', 'word']));

    expect(cursor.advanceCalls).toBe(leaves.length);
    const positions = cursor.queries.map(q => q.position);
    expect(positions).toEqual([...positions].sort((a, b) => a - b));
    expect(Math.max(...positions)).toBe(leaves.length - 1);
  });

  it('runs a session only once', () => {
    const cursor = new ScriptedCursor('word', [{ text: 'a' }]);
    const engine = new GroupingEngine(cursor, treeSpec(['word']));

    expect(engine.run()).toEqual(['a']);
    expect(() => engine.run()).toThrow(SessionConsumedError);
  });

  it('propagates cursor errors as they are', () => {
    const group = (key: string): KeyedGroup => ({
      key,
      content: { text: key, confidence: 1, box: [[0, 0], [1, 1]] },
    });
    const cursor = new KeyedLeafCursor<string>(['word'], [new Map([['word', group('w')]])]);

    expect(() => nest(cursor, treeSpec(['line', 'word']))).toThrow(InvalidLevelError);
  });

  it('propagates boxer errors as they are', () => {
    const failure = new Error('boxer failed');
    const spec = new LevelSpec<string, string>(['word'], {
      leaf: () => {
        throw failure;
      },
    });
    const cursor = new ScriptedCursor('word', [{ text: 'a' }]);

    expect(() => nest(cursor, spec)).toThrow(failure);
  });
});

describe('GroupingEngine over keyed leaves', () => {
  const shapes = [[1, 1, 1, 1], [2, 2], [3, 1], [1, 3], [4]];

  function cursorFor(shape: number[]) {
    const leaves = shape.flatMap((size, line) =>
      Array.from({ length: size }, (_, i) => {
        const text = `l${line}w${i}`;
        const box: BoundingBox = [[0, 0], [1, 1]];
        const content = { text, confidence: 90, box };
        return new Map<string, KeyedGroup>([
          ['line', { key: `line-${line}`, content: { ...content, text: `line-${line}` } }],
          ['word', { key: text, content }],
        ]);
      })
    );
    return new KeyedLeafCursor<string>(['line', 'word'], leaves);
  }

  for (const shape of shapes) {
    it(`keeps leaf order and group sizes for lines of ${shape.join('+')} words`, () => {
      const lines = nest(cursorFor(shape), treeSpec(['line', 'word']));

      const expected = shape.flatMap((size, line) => Array.from({ length: size }, (_, i) => `l${line}w${i}`));
      expect(leafTexts(lines)).toEqual(expected);
      expect(lines.map(l => (Array.isArray(l) ? l.length : 0))).toEqual(shape);
    });
  }
});
