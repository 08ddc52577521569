// src/core/common/interfaces/models.ts

/** Columns every record in a batch must carry, in report order. */
export const REQUIRED_COLUMNS = [
    'KK_NO',
    'NIK',
    'CUSTNAME',
    'JENIS_KELAMIN',
    'TANGGAL_LAHIR',
    'TEMPAT_LAHIR',
] as const;

/** Annotation column added to messy records. */
export const DESCRIPTION_COLUMN = 'Check_Desc';

export type RequiredColumn = typeof REQUIRED_COLUMNS[number];

/**
 * A cell as it arrives from a source. Parsers deliver text or null, but
 * programmatic callers may hand over numbers, booleans or Dates.
 */
export type CellValue = string | number | boolean | Date | null | undefined;

/**
 * One population-registry row, projected onto the required columns.
 */
export type PopulationRecord = {
    [K in RequiredColumn]: CellValue;
};

/** A record on the messy side of a batch, with its failure annotations. */
export type AnnotatedRecord = PopulationRecord & {
    /** Joined failure descriptions, e.g. "Invalid NIK (123); Invalid Gender (X); " */
    [DESCRIPTION_COLUMN]: string;
};

/**
 * Normalized (upper-cased, trimmed) place names accepted for TEMPAT_LAHIR.
 * Built once per run and never mutated afterwards.
 */
export type ReferencePlaceSet = ReadonlySet<string>;

/** Bucket names used when counting invalid records per rule. */
export type RuleName = 'KK_NO' | 'NIK' | 'Name' | 'Gender' | 'Place' | 'Birth Date';

export type InvalidCounts = Readonly<Record<RuleName, number>>;

/**
 * Result of running every field rule against one record.
 */
export interface ValidationOutcome {
    /** Pass/fail per rule, keyed by bucket name */
    readonly results: Readonly<Record<RuleName, boolean>>;
    readonly isClean: boolean;
    /** "<message> (<raw value>)" per failing rule, in rule order */
    readonly failures: readonly string[];
    /** failures joined with a trailing separator; '' when clean */
    readonly description: string;
}

/**
 * Output of a batch run. Clean and messy are a strict partition of the input.
 */
export interface BatchResult {
    readonly clean: readonly PopulationRecord[];
    readonly messy: readonly AnnotatedRecord[];
    readonly invalidCounts: InvalidCounts;
    readonly total: number;
}
