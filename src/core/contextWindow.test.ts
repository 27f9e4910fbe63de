import { describe, it, expect } from 'vitest';

import type { StepRecord } from '../schema/index.js';
import { ContextWindow, ELISION_MARKER, TRUNCATION_MARKER, elideOutput } from './contextWindow.js';

function rec(i: number): StepRecord {
  return {
    planText: `step ${String(i)}`,
    command: `cmd${String(i)}`,
    output: `out${String(i)}`,
    timestamp: '2024-01-01T00:00:00.000Z',
  };
}

function block(i: number): string {
  return `--- Step ${String(i)} ---\nPlan: step ${String(i)}\nCommand: cmd${String(i)}\nOutput: out${String(i)}\n\n`;
}

function windowWith(count: number, maxChars?: number): ContextWindow {
  let w = ContextWindow.create('g', { maxChars });
  for (let i = 1; i <= count; i++) w = w.append(rec(i));
  return w;
}

describe('ContextWindow rendering', () => {
  it('should render only the goal header when empty', () => {
    expect(ContextWindow.create('g').render()).toBe('GOAL: g\n\n');
  });

  it('should render steps in order under a history label', () => {
    expect(windowWith(2).render()).toBe(`GOAL: g\n\nHISTORY:\n${block(1)}${block(2)}`);
  });

  it('should append the remaining plan steps', () => {
    expect(windowWith(1).render(['a', 'b'])).toBe(
      `GOAL: g\n\nHISTORY:\n${block(1)}CURRENT PLAN:\n1. a\n2. b\n`,
    );
  });

  it('should measure the untruncated view', () => {
    const w = windowWith(2);
    expect(w.measure(['a'])).toBe(w.render(['a']).length);
  });
});

describe('ContextWindow truncation', () => {
  // header 9 + marker 13 + two 56-char blocks
  const maxChars = 134;

  it('should keep whole trailing steps behind a truncation marker', () => {
    const rendered = windowWith(3, maxChars).render();
    expect(rendered).toBe(`GOAL: g\n\n${TRUNCATION_MARKER}${block(2)}${block(3)}`);
    expect(rendered.length).toBeLessThanOrEqual(maxChars);
  });

  it('should start the kept history at a step boundary', () => {
    const rendered = windowWith(3, maxChars - 1).render();
    const afterMarker = rendered.slice(`GOAL: g\n\n${TRUNCATION_MARKER}`.length);
    expect(afterMarker).toBe(block(3));
  });

  it('should render every step when truncation is turned off', () => {
    expect(windowWith(3, maxChars).render([], { truncate: false })).toBe(
      `GOAL: g\n\nHISTORY:\n${block(1)}${block(2)}${block(3)}`,
    );
  });

  it('should keep an oversized newest step with its output elided', () => {
    const output = `HEAD${'x'.repeat(1192)}TAIL`;
    const w = ContextWindow.create('g', { maxChars: 1000 }).append({
      planText: 'p',
      command: 'nmap',
      output,
      timestamp: '2024-01-01T00:00:00.000Z',
    });

    const rendered = w.render(['next']);
    expect(rendered).toHaveLength(1000);
    expect(rendered.startsWith(`GOAL: g\n\n${TRUNCATION_MARKER}--- Step 1 ---\nPlan: p\nCommand: nmap\nOutput: HEAD`)).toBe(true);
    expect(rendered).toContain(ELISION_MARKER);
    expect(rendered.endsWith('TAIL\n\nCURRENT PLAN:\n1. next\n')).toBe(true);
    expect(w.render(['next'], { truncate: false })).toContain(output);
  });

  it('should drop the newest step when not even its elided form fits', () => {
    const w = ContextWindow.create('g', { maxChars: 40 }).append({
      planText: 'p',
      command: 'nmap',
      output: 'x'.repeat(500),
      timestamp: '2024-01-01T00:00:00.000Z',
    });
    expect(w.render()).toBe(`GOAL: g\n\n${TRUNCATION_MARKER}`);
  });

  it('should still report the full length from measure', () => {
    expect(windowWith(3, maxChars).measure()).toBe(9 + 'HISTORY:\n'.length + 3 * 56);
  });
});

describe('elideOutput', () => {
  it('should leave output within the cap untouched', () => {
    expect(elideOutput('short', 5)).toBe('short');
  });

  it('should keep the head and tail around the marker', () => {
    const output = 'abcdefghij'.repeat(10);
    const cap = ELISION_MARKER.length + 20;
    expect(elideOutput(output, cap)).toBe(`abcdefghij${ELISION_MARKER}abcdefghij`);
  });
});

describe('ContextWindow condensation', () => {
  it('should replace steps with the summary', () => {
    const c = windowWith(3).condense('summary text');
    expect(c.isCondensed).toBe(true);
    expect(c.render()).toBe('GOAL: g\n\nHISTORY SUMMARY:\nsummary text\n\n');
    expect(c.records).toHaveLength(3);
  });

  it('should render steps recorded after condensation behind the summary', () => {
    const c = windowWith(3).condense('s').append(rec(4));
    expect(c.render()).toBe(`GOAL: g\n\nHISTORY SUMMARY:\ns\n\nHISTORY:\n${block(4)}`);
  });

  it('should render an explicit condensed view with the plan', () => {
    expect(windowWith(2).renderCondensed('s', ['x'])).toBe(
      'GOAL: g\n\nHISTORY SUMMARY:\ns\n\nCURRENT PLAN:\n1. x\n',
    );
  });

  it('should leave the full view available after condensing', () => {
    const w = windowWith(1);
    expect(w.condense('s').renderFull()).toBe(w.render());
  });
});

describe('ContextWindow value semantics', () => {
  it('should not change a window when appending to it', () => {
    const w1 = windowWith(1);
    const w2 = w1.append(rec(2));
    expect(w1.records.map((r) => r.command)).toEqual(['cmd1']);
    expect(w2.records.map((r) => r.command)).toEqual(['cmd1', 'cmd2']);
  });

  it('should keep branches independent when a stale window is appended to', () => {
    const base = windowWith(1);
    const left = base.append(rec(2));
    const right = base.append(rec(3));
    expect(left.records.map((r) => r.command)).toEqual(['cmd1', 'cmd2']);
    expect(right.records.map((r) => r.command)).toEqual(['cmd1', 'cmd3']);
    expect(base.records).toHaveLength(1);
  });

  it('should freeze stored records', () => {
    const record = rec(1);
    const w = ContextWindow.create('g').append(record);
    record.output = 'changed';
    expect(w.records[0]?.output).toBe('out1');
    expect(Object.isFrozen(w.records[0])).toBe(true);
  });
});
