/**
 * @fileoverview The shared context ("baggage") every tool reads and writes
 * during one pipeline run.
 *
 * Underneath it is one mutable string-keyed map. Well-known slots are
 * addressed through typed {@link BaggageKey}s: writes are validated against
 * the key's zod schema, reads come back typed. Absence is a normal state and
 * reads return `undefined` for it.
 */

import { z } from 'zod';
import { log as rootLog, type Logger } from '../utils/logger.ts';

export interface BaggageKey<T> {
  readonly name: string;
  readonly schema: z.ZodType<T>;
}

export function baggageKey<T>(name: string, schema: z.ZodType<T>): BaggageKey<T> {
  return { name, schema };
}

export class BaggageValueError extends Error {
  constructor(
    readonly key: string,
    readonly issues: string,
  ) {
    super(`invalid value for baggage key ${key}:\n${issues}`);
    this.name = 'BaggageValueError';
  }
}

/** A read of a key that was written by a tool outside the reader's dependency closure. */
export interface DisciplineViolation {
  reader: string;
  key: string;
  writer: string;
}

type Entry = {
  value: unknown;
  writer: string | null; // null for values seeded before the run
};

type ActiveTool = {
  name: string;
  ancestors: ReadonlySet<string> | null; // null: reads are not checked
};

export class Baggage {
  private entries = new Map<string, Entry>();
  private active: ActiveTool | null = null;
  private readonly violations: DisciplineViolation[] = [];
  private readonly log: Logger;

  constructor(initial: Record<string, unknown> = {}, log: Logger = rootLog.child('baggage')) {
    this.log = log;
    for (const [name, value] of Object.entries(initial)) {
      this.entries.set(name, { value, writer: null });
    }
  }

  static from(initial: Record<string, unknown>): Baggage {
    return new Baggage(initial);
  }

  // ------------------------------------------------------------
  // typed slots
  // ------------------------------------------------------------

  get<T>(key: BaggageKey<T>): T | undefined {
    const entry = this.read(key.name);
    if (!entry) return undefined;

    const parsed = key.schema.safeParse(entry.value);
    if (!parsed.success) {
      this.log.warn(`ignoring malformed value under ${key.name}: ${z.prettifyError(parsed.error)}`);
      return undefined;
    }
    return parsed.data;
  }

  set<T>(key: BaggageKey<T>, value: T): void {
    const parsed = key.schema.safeParse(value);
    if (!parsed.success) {
      throw new BaggageValueError(key.name, z.prettifyError(parsed.error));
    }
    this.entries.set(key.name, { value: parsed.data, writer: this.active?.name ?? null });
  }

  has<T>(key: BaggageKey<T> | string): boolean {
    return this.entries.has(typeof key === 'string' ? key : key.name);
  }

  // ------------------------------------------------------------
  // untyped access
  // ------------------------------------------------------------

  getRaw(name: string): unknown {
    return this.read(name)?.value;
  }

  setRaw(name: string, value: unknown): void {
    this.entries.set(name, { value, writer: this.active?.name ?? null });
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Which tool wrote a key. `null` means it was seeded before the run,
   * `undefined` means nothing has been written under it.
   */
  writerOf(name: string): string | null | undefined {
    return this.entries.get(name)?.writer;
  }

  /** Plain-object copy for reporting; excluded keys are replaced by a marker string. */
  snapshot(exclude: readonly string[] = []): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [name, entry] of this.entries) {
      out[name] = exclude.includes(name) ? `<${name} excluded>` : entry.value;
    }
    return out;
  }

  // ------------------------------------------------------------
  // discipline tracking (driven by the pipeline)
  // ------------------------------------------------------------

  /**
   * Marks `toolName` as the active writer. With `ancestors` set, reads of keys
   * written by any other tool outside that set are recorded as violations.
   */
  enter(toolName: string, ancestors: ReadonlySet<string> | null = null): void {
    this.active = { name: toolName, ancestors };
  }

  exit(): void {
    this.active = null;
  }

  getViolations(): DisciplineViolation[] {
    return [...this.violations];
  }

  private read(name: string): Entry | undefined {
    const entry = this.entries.get(name);
    const reader = this.active;
    if (entry && reader?.ancestors && entry.writer !== null && entry.writer !== reader.name) {
      if (!reader.ancestors.has(entry.writer)) {
        this.violations.push({ reader: reader.name, key: name, writer: entry.writer });
        this.log.warn(
          `${reader.name} read ${name}, written by ${entry.writer} which is not one of its dependencies`,
        );
      }
    }
    return entry;
  }
}
