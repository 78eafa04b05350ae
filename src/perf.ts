import type { Diagnostic } from "./diagnostics/index.js";
import type { DefinedTypeKind } from "./syntax-objects/defined-type.js";

export type CheckCounter = "type-specifiers-resolved" | "references-bound";

export type CheckProfileSummary = {
  document: string;
  ok: boolean;
  phasesMs: Record<string, number>;
  declarations: Partial<Record<DefinedTypeKind, number>>;
  counters: Partial<Record<CheckCounter, number>>;
  /** Recorded diagnostics by code */
  diagnostics: Record<string, number>;
};

const CHECK_PERF_ENV = "IDL_CHECK_PERF";

const readPerfEnv = (): string | undefined => globalThis.process?.env?.[CHECK_PERF_ENV];

const PERF_ENABLED = (() => {
  const raw = readPerfEnv();
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
})();

const roundMs = (value: number): number => Math.round(value * 1000) / 1000;

const toSortedRecord = <K extends string>(
  entries: ReadonlyMap<K, number>,
  map: (value: number) => number = (value) => value
): Partial<Record<K, number>> => {
  const record: Partial<Record<K, number>> = {};
  Array.from(entries.keys())
    .sort((left, right) => left.localeCompare(right))
    .forEach((key) => {
      record[key] = map(entries.get(key) ?? 0);
    });
  return record;
};

export const isCheckPerfEnabled = (): boolean => PERF_ENABLED;

/** What one `checkDocument` call spent and saw */
export class CheckProfile {
  readonly document: string;
  readonly #phasesMs = new Map<string, number>();
  readonly #declarations = new Map<DefinedTypeKind, number>();
  readonly #counters = new Map<CheckCounter, number>();

  constructor(document: string) {
    this.document = document;
  }

  /** Runs `fn` and adds its wall time to `phase`, even when it throws */
  time<T>(phase: string, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      const elapsed = performance.now() - start;
      this.#phasesMs.set(phase, (this.#phasesMs.get(phase) ?? 0) + elapsed);
    }
  }

  countDeclaration(kind: DefinedTypeKind): void {
    this.#declarations.set(kind, (this.#declarations.get(kind) ?? 0) + 1);
  }

  count(counter: CheckCounter, amount = 1): void {
    if (amount === 0) return;
    this.#counters.set(counter, (this.#counters.get(counter) ?? 0) + amount);
  }

  summary({
    ok,
    diagnostics,
  }: {
    ok: boolean;
    diagnostics: readonly Diagnostic[];
  }): CheckProfileSummary {
    const codes = new Map<string, number>();
    diagnostics.forEach(({ code }) => codes.set(code, (codes.get(code) ?? 0) + 1));

    const phasesMs: Record<string, number> = {};
    Object.assign(phasesMs, toSortedRecord(this.#phasesMs, roundMs));
    const byCode: Record<string, number> = {};
    Object.assign(byCode, toSortedRecord(codes));

    return {
      document: this.document,
      ok,
      phasesMs,
      declarations: toSortedRecord(this.#declarations),
      counters: toSortedRecord(this.#counters),
      diagnostics: byCode,
    };
  }
}

/** A fresh profile when `IDL_CHECK_PERF` is set, otherwise nothing is measured */
export const startCheckProfile = (document: string): CheckProfile | undefined =>
  PERF_ENABLED ? new CheckProfile(document) : undefined;

export const timeCheckPhase = <T>(
  profile: CheckProfile | undefined,
  phase: string,
  fn: () => T
): T => (profile ? profile.time(phase, fn) : fn());

export const logCheckProfile = (
  profile: CheckProfile | undefined,
  result: { ok: boolean; diagnostics: readonly Diagnostic[] }
): void => {
  if (!profile) return;
  console.error(`[idl:check:perf] ${JSON.stringify(profile.summary(result))}`);
};
