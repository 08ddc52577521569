// src/core/validation/record-classifier.ts
import config from '../../config';
import { PopulationRecord, ReferencePlaceSet, RuleName, ValidationOutcome } from '../common/interfaces/models';
import { displayFieldInput, FIELD_RULES, RuleContext, toFieldInput } from './field-rules';

/**
 * Joins failure descriptions so that every entry, the last included, is
 * followed by the separator. Downstream consumers of the annotation column
 * rely on that trailing separator.
 */
export function joinFailures(failures: readonly string[], separator: string = config.validation.descriptionSeparator): string {
    return failures.map(failure => `${failure}${separator}`).join('');
}

/**
 * Runs every field rule against one record. All rules are evaluated, no
 * short-circuit. Malformed values fail their rule; nothing here throws.
 *
 * @param referenceDate - "Today" for the birth-date rule. Passed in rather than read from the clock.
 */
export function classifyRecord(
    record: PopulationRecord,
    places: ReferencePlaceSet,
    referenceDate: Date
): ValidationOutcome {
    const context: RuleContext = { places, referenceDate };
    const results: Partial<Record<RuleName, boolean>> = {};
    const failures: string[] = [];

    for (const rule of FIELD_RULES) {
        const input = toFieldInput(record[rule.column]);
        const passed = rule.test(input, context);
        results[rule.name] = passed;
        if (!passed) {
            failures.push(`${rule.message} (${displayFieldInput(input)})`);
        }
    }

    return {
        results: {
            'KK_NO': results['KK_NO'] === true,
            'NIK': results['NIK'] === true,
            'Name': results['Name'] === true,
            'Gender': results['Gender'] === true,
            'Place': results['Place'] === true,
            'Birth Date': results['Birth Date'] === true,
        },
        isClean: failures.length === 0,
        failures,
        description: joinFailures(failures),
    };
}
