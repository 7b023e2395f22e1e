/**
 * Immutable in-memory cohort of subject records.
 *
 * Covariate columns are resolved once, at construction: a column whose every
 * available value is numeric becomes a numeric covariate, anything else is
 * categorical. Records without a usable positive time or event flag are
 * excluded and listed in `exclusions`.
 */

import { z } from "zod";
import { EmptyCohortError, InvalidCohortError } from "@/lib/errors";
import { type Logger, defaultLogger } from "@/lib/logger";

export type CovariateValue =
  | { kind: "numeric"; value: number }
  | { kind: "categorical"; value: string };

export type CovariateKind = CovariateValue["kind"];

export interface SubjectRecord {
  readonly id: string;
  readonly time: number;
  readonly event: boolean;
  readonly covariates: ReadonlyMap<string, CovariateValue>;
}

export interface SubjectRecordInput {
  id: string | number;
  time: unknown;
  event: unknown;
  covariates?: Record<string, unknown>;
}

export interface CohortExclusion {
  id: string;
  reason: string;
}

export interface FromRowsOptions {
  idField?: string;
  timeField?: string;
  eventField?: string;
  /** Columns to read as covariates; defaults to every other column */
  covariateFields?: string[];
  logger?: Logger;
}

const MISSING_STRINGS = new Set(["", "NA", "NaN", "nan", "null"]);

const IdSchema = z.union([
  z.string().trim().min(1),
  z.number().finite().transform(n => String(n)),
]);

const TimeSchema = z
  .union([z.number(), z.string().trim().min(1).transform(s => Number(s))])
  .pipe(z.number().finite().positive());

const EventSchema = z.union([
  z.boolean(),
  z.literal(0).transform(() => false),
  z.literal(1).transform(() => true),
  z.enum(["0", "1", "true", "false", "TRUE", "FALSE"]).transform(s => s === "1" || s.toLowerCase() === "true"),
]);

const RowsSchema = z.array(z.record(z.string(), z.unknown()));

function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "number") return Number.isNaN(value);
  if (typeof value === "string") return MISSING_STRINGS.has(value.trim());
  return false;
}

function asNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function resolveColumnKinds(
  entries: Array<{ covariates: Record<string, unknown> }>
): Map<string, CovariateKind> {
  const kinds = new Map<string, CovariateKind>();
  for (const entry of entries) {
    for (const [name, raw] of Object.entries(entry.covariates)) {
      if (isMissing(raw)) continue;
      const isNumeric = asNumber(raw) !== null;
      const current = kinds.get(name);
      if (current === undefined) {
        kinds.set(name, isNumeric ? "numeric" : "categorical");
      } else if (current === "numeric" && !isNumeric) {
        kinds.set(name, "categorical");
      }
    }
  }
  return kinds;
}

function toCovariateValue(raw: unknown, kind: CovariateKind): CovariateValue | null {
  if (isMissing(raw)) return null;
  if (kind === "numeric") {
    const n = asNumber(raw);
    return n === null ? null : { kind: "numeric", value: n };
  }
  return { kind: "categorical", value: typeof raw === "string" ? raw.trim() : String(raw) };
}

export class SubjectCohort {
  readonly records: readonly SubjectRecord[];
  readonly exclusions: readonly CohortExclusion[];
  private readonly kinds: ReadonlyMap<string, CovariateKind>;

  private constructor(
    records: readonly SubjectRecord[],
    kinds: ReadonlyMap<string, CovariateKind>,
    exclusions: readonly CohortExclusion[]
  ) {
    this.records = Object.freeze([...records]);
    this.kinds = kinds;
    this.exclusions = exclusions;
  }

  /**
   * Build a cohort from structured record inputs.
   */
  static fromRecords(inputs: SubjectRecordInput[], logger: Logger = defaultLogger): SubjectCohort {
    const seen = new Set<string>();
    const exclusions: CohortExclusion[] = [];
    const eligible: Array<{ id: string; time: number; event: boolean; covariates: Record<string, unknown> }> = [];

    inputs.forEach((input, index) => {
      const id = IdSchema.safeParse(input.id);
      if (!id.success) {
        throw new InvalidCohortError(`Row ${index} has no usable subject id`);
      }
      if (seen.has(id.data)) {
        throw new InvalidCohortError(`Duplicate subject id "${id.data}"`);
      }
      seen.add(id.data);

      const time = TimeSchema.safeParse(input.time);
      if (!time.success) {
        exclusions.push({ id: id.data, reason: `time must be a positive finite number (got ${String(input.time)})` });
        return;
      }
      const event = EventSchema.safeParse(input.event);
      if (!event.success) {
        exclusions.push({ id: id.data, reason: `event flag is not boolean or 0/1 (got ${String(input.event)})` });
        return;
      }
      eligible.push({ id: id.data, time: time.data, event: event.data, covariates: input.covariates ?? {} });
    });

    if (exclusions.length > 0) {
      logger.warn(`Excluded ${exclusions.length} of ${inputs.length} subjects with unusable time or event`);
    }

    const kinds = resolveColumnKinds(eligible);
    const records = eligible.map(entry => {
      const covariates = new Map<string, CovariateValue>();
      for (const [name, kind] of kinds) {
        const value = toCovariateValue(entry.covariates[name], kind);
        if (value) covariates.set(name, value);
      }
      return Object.freeze({ id: entry.id, time: entry.time, event: entry.event, covariates });
    });

    return new SubjectCohort(records, kinds, Object.freeze(exclusions));
  }

  /**
   * Build a cohort from flat tabular rows, e.g. parsed CSV objects.
   */
  static fromRows(rows: unknown, options: FromRowsOptions = {}): SubjectCohort {
    const {
      idField = "id",
      timeField = "time",
      eventField = "event",
      covariateFields,
      logger = defaultLogger,
    } = options;

    const parsed = RowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new InvalidCohortError("Rows must be an array of objects");
    }

    const reserved = new Set([idField, timeField, eventField]);
    const inputs: SubjectRecordInput[] = parsed.data.map((row, index) => {
      const rawId = row[idField];
      if (typeof rawId !== "string" && typeof rawId !== "number") {
        throw new InvalidCohortError(`Row ${index} has no "${idField}" column`);
      }
      const fields = covariateFields ?? Object.keys(row).filter(key => !reserved.has(key));
      const covariates: Record<string, unknown> = {};
      fields.forEach(field => {
        covariates[field] = row[field];
      });
      return { id: rawId, time: row[timeField], event: row[eventField], covariates };
    });

    return SubjectCohort.fromRecords(inputs, logger);
  }

  get size(): number {
    return this.records.length;
  }

  get ids(): string[] {
    return this.records.map(r => r.id);
  }

  get eventCount(): number {
    return this.records.reduce((sum, r) => sum + (r.event ? 1 : 0), 0);
  }

  get covariateNames(): string[] {
    return Array.from(this.kinds.keys());
  }

  covariateKind(name: string): CovariateKind | undefined {
    return this.kinds.get(name);
  }

  /**
   * Available numeric values of a covariate, keyed by subject id
   */
  numericValues(name: string): Map<string, number> {
    const values = new Map<string, number>();
    for (const record of this.records) {
      const value = record.covariates.get(name);
      if (value?.kind === "numeric") values.set(record.id, value.value);
    }
    return values;
  }

  /**
   * Available covariate values rendered as strings, keyed by subject id
   */
  categoricalValues(name: string): Map<string, string> {
    const values = new Map<string, string>();
    for (const record of this.records) {
      const value = record.covariates.get(name);
      if (value) values.set(record.id, String(value.value));
    }
    return values;
  }

  filter(predicate: (record: SubjectRecord) => boolean): SubjectCohort {
    return new SubjectCohort(this.records.filter(predicate), this.kinds, this.exclusions);
  }

  restrictTo(ids: Iterable<string>): SubjectCohort {
    const wanted = new Set(ids);
    return this.filter(record => wanted.has(record.id));
  }

  /**
   * Throws when the cohort has no subjects; used at top-level entry points.
   */
  assertNonEmpty(context = "cohort"): this {
    if (this.size === 0) {
      throw new EmptyCohortError(`The ${context} has no eligible subjects`);
    }
    return this;
  }
}
