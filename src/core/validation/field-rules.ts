// src/core/validation/field-rules.ts
import config from '../../config';
import { CellValue, ReferencePlaceSet, RequiredColumn, RuleName } from '../common/interfaces/models';
import { formatDateToDDMMYYYY, isOnOrBeforeDay, parseDayMonthYear } from '../common/utils';

/**
 * A cell value classified at the rule boundary. Rules branch on `kind`
 * instead of coercing whatever the source produced.
 */
export type FieldInput =
    | { readonly kind: 'text'; readonly value: string }
    | { readonly kind: 'missing' }
    | { readonly kind: 'other'; readonly value: number | boolean | Date };

export function toFieldInput(value: CellValue): FieldInput {
    if (typeof value === 'string') return { kind: 'text', value };
    if (value === null || value === undefined) return { kind: 'missing' };
    // NaN is how some sources spell an empty numeric cell
    if (typeof value === 'number' && isNaN(value)) return { kind: 'missing' };
    return { kind: 'other', value };
}

/** Renders the raw value the way it is quoted inside a failure description. */
export function displayFieldInput(input: FieldInput): string {
    switch (input.kind) {
        case 'text':
            return input.value;
        case 'missing':
            return '';
        case 'other':
            return input.value instanceof Date ? formatDateToDDMMYYYY(input.value) : String(input.value);
    }
}

export interface RuleContext {
    readonly places: ReferencePlaceSet;
    /** "Today" for the birth-date rule */
    readonly referenceDate: Date;
}

export interface FieldRule {
    readonly column: RequiredColumn;
    readonly name: RuleName;
    readonly message: string;
    readonly test: (input: FieldInput, context: RuleContext) => boolean;
}

const SIXTEEN_DIGITS = /^[0-9]{16}$/;
// Decimal digits plus the superscript, subscript and circled digit forms
const ANY_DIGIT = /[\p{Nd}\u00B2\u00B3\u00B9\u2070\u2074-\u2079\u2080-\u2089\u2460-\u2468\u2474-\u247C\u2488-\u2490\u24EA\u24F5-\u24FD\u24FF\u2776-\u277E\u2780-\u2788\u278A-\u2792\u{1F100}-\u{1F10A}]/u;

const acceptedGenders: ReadonlySet<string> = new Set(config.validation.acceptedGenders);

export function normalizeText(value: string): string {
    return value.toUpperCase().trim();
}

/** 16 ASCII digits, not ending in "0000". Shared by KK_NO and NIK. */
export function isValidIdentityNumber(input: FieldInput): boolean {
    return input.kind === 'text'
        && SIXTEEN_DIGITS.test(input.value)
        && !input.value.endsWith('0000');
}

export function isValidName(input: FieldInput): boolean {
    return input.kind === 'text' && !ANY_DIGIT.test(input.value);
}

/** Non-text values are stringified before the lookup, so a missing cell never matches. */
export function isValidGender(input: FieldInput): boolean {
    const text = input.kind === 'text' ? input.value : displayFieldInput(input);
    return acceptedGenders.has(normalizeText(text));
}

export function isValidPlace(input: FieldInput, places: ReferencePlaceSet): boolean {
    return input.kind === 'text' && places.has(normalizeText(input.value));
}

export function isValidBirthDate(input: FieldInput, referenceDate: Date): boolean {
    let date: Date | null = null;
    if (input.kind === 'text') {
        date = parseDayMonthYear(input.value);
    } else if (input.kind === 'other' && input.value instanceof Date && !isNaN(input.value.getTime())) {
        date = input.value;
    }
    return date !== null && isOnOrBeforeDay(date, referenceDate);
}

/**
 * The fixed rule set, in the order failures are reported.
 */
export const FIELD_RULES: readonly FieldRule[] = Object.freeze([
    { column: 'KK_NO', name: 'KK_NO', message: 'Invalid KK_NO', test: input => isValidIdentityNumber(input) },
    { column: 'NIK', name: 'NIK', message: 'Invalid NIK', test: input => isValidIdentityNumber(input) },
    { column: 'CUSTNAME', name: 'Name', message: 'Invalid Name', test: input => isValidName(input) },
    { column: 'JENIS_KELAMIN', name: 'Gender', message: 'Invalid Gender', test: input => isValidGender(input) },
    { column: 'TEMPAT_LAHIR', name: 'Place', message: 'Invalid Place', test: (input, ctx) => isValidPlace(input, ctx.places) },
    { column: 'TANGGAL_LAHIR', name: 'Birth Date', message: 'Invalid Birth Date', test: (input, ctx) => isValidBirthDate(input, ctx.referenceDate) },
] satisfies FieldRule[]);

/** Bucket names in rule order. */
export const RULE_NAMES: readonly RuleName[] = FIELD_RULES.map(rule => rule.name);
