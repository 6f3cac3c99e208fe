import { ConfigError } from '../utils/errors.js';

export interface Axis {
  readonly name: string;
  readonly values: readonly string[];
}

export type Bindings = Readonly<Record<string, string>>;

export interface Cell {
  /** Position in expansion order, starting at 0. */
  readonly index: number;
  /** Axis values in declaration order, e.g. "3.8, ubuntu". */
  readonly id: string;
  readonly bindings: Bindings;
}

export interface MatrixOptions {
  /** Extra cells appended after the product. Each must bind every axis. */
  include?: readonly Record<string, string>[];
  /** Partial bindings; a cell matching every key of an entry is dropped. */
  exclude?: readonly Record<string, string>[];
}

const DEFAULT_CELL_ID = 'default';

function validateAxes(axes: readonly Axis[]): void {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const axis of axes) {
    if (!axis.name.trim()) {
      issues.push('axis name must not be empty');
      continue;
    }
    if (seen.has(axis.name)) {
      issues.push(`axis "${axis.name}" is declared more than once`);
    }
    seen.add(axis.name);

    if (axis.values.length === 0) {
      issues.push(`axis "${axis.name}" has no values`);
      continue;
    }
    const dupes = axis.values.filter((v, i) => axis.values.indexOf(v) !== i);
    if (dupes.length > 0) {
      issues.push(`axis "${axis.name}" repeats value(s): ${[...new Set(dupes)].join(', ')}`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid matrix declaration', issues);
  }
}

function checkKeys(
  kind: 'include' | 'exclude',
  entries: readonly Record<string, string>[],
  axisNames: readonly string[],
): void {
  const issues: string[] = [];
  entries.forEach((entry, i) => {
    const keys = Object.keys(entry);
    for (const key of keys) {
      if (!axisNames.includes(key)) {
        issues.push(`${kind}[${i}] references unknown axis "${key}"`);
      }
    }
    if (kind === 'include') {
      const missing = axisNames.filter((name) => !(name in entry));
      if (missing.length > 0) {
        issues.push(`${kind}[${i}] does not bind axis ${missing.map((m) => `"${m}"`).join(', ')}`);
      }
    } else if (keys.length === 0) {
      issues.push(`${kind}[${i}] is empty and would remove every cell`);
    }
  });

  if (issues.length > 0) {
    throw new ConfigError(`Invalid matrix ${kind}`, issues);
  }
}

function matches(bindings: Bindings, partial: Record<string, string>): boolean {
  return Object.entries(partial).every(([key, value]) => bindings[key] === value);
}

function bindingKey(axisNames: readonly string[], bindings: Bindings): string {
  return JSON.stringify(axisNames.map((name) => bindings[name]));
}

function makeCell(index: number, axisNames: readonly string[], bindings: Bindings): Cell {
  const ordered: Record<string, string> = {};
  for (const name of axisNames) {
    ordered[name] = bindings[name];
  }
  const id = axisNames.length > 0 ? axisNames.map((name) => ordered[name]).join(', ') : DEFAULT_CELL_ID;
  return Object.freeze({ index, id, bindings: Object.freeze(ordered) });
}

/**
 * Expands axes into the cartesian product of their values, in lexicographic
 * order over axis declaration order (the last axis varies fastest).
 * No axes yields a single cell with no bindings.
 */
export function expandMatrix(axes: readonly Axis[], options: MatrixOptions = {}): Cell[] {
  validateAxes(axes);

  const axisNames = axes.map((a) => a.name);
  const include = options.include ?? [];
  const exclude = options.exclude ?? [];
  checkKeys('exclude', exclude, axisNames);
  checkKeys('include', include, axisNames);

  let combos: Record<string, string>[] = [{}];
  for (const axis of axes) {
    combos = combos.flatMap((partial) => axis.values.map((value) => ({ ...partial, [axis.name]: value })));
  }

  const kept = combos.filter((combo) => !exclude.some((entry) => matches(combo, entry)));

  const seen = new Set(kept.map((combo) => bindingKey(axisNames, combo)));
  for (const entry of include) {
    const key = bindingKey(axisNames, entry);
    if (!seen.has(key)) {
      seen.add(key);
      kept.push({ ...entry });
    }
  }

  if (kept.length === 0) {
    throw new ConfigError('Matrix exclusions remove every cell; nothing would run');
  }

  return kept.map((combo, index) => makeCell(index, axisNames, combo));
}

/** "python-version=3.8 os=ubuntu" */
export function describeCell(cell: Cell): string {
  const pairs = Object.entries(cell.bindings).map(([name, value]) => `${name}=${value}`);
  return pairs.length > 0 ? pairs.join(' ') : DEFAULT_CELL_ID;
}
