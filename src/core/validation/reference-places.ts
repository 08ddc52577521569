// src/core/validation/reference-places.ts
import { CellValue, ReferencePlaceSet } from '../common/interfaces/models';
import { displayFieldInput, normalizeText, toFieldInput } from './field-rules';

/** Preferred city-list column; the first column is used when it is absent. */
export const CITY_COLUMN = 'CITY_DESC';

/**
 * Builds the immutable set of accepted birthplaces. Entries are upper-cased
 * and trimmed; blank and missing entries are dropped.
 */
export function buildReferencePlaceSet(names: Iterable<CellValue>): ReferencePlaceSet {
    const places = new Set<string>();
    for (const name of names) {
        const normalized = normalizeText(displayFieldInput(toFieldInput(name)));
        if (normalized !== '') {
            places.add(normalized);
        }
    }
    return places;
}

