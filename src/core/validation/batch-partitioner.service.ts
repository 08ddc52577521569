// src/core/validation/batch-partitioner.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { MissingColumnsError } from '../common/errors';
import {
    AnnotatedRecord,
    BatchResult,
    DESCRIPTION_COLUMN,
    PopulationRecord,
    REQUIRED_COLUMNS,
    ReferencePlaceSet,
    RuleName
} from '../common/interfaces/models';
import { toLocalCalendarDay } from '../common/utils';
import { RULE_NAMES } from './field-rules';
import { IBatchPartitionerService, PartitionOptions } from './interfaces/services';
import { classifyRecord } from './record-classifier';

const emptyCounts = (): Record<RuleName, number> => ({
    'KK_NO': 0,
    'NIK': 0,
    'Name': 0,
    'Gender': 0,
    'Place': 0,
    'Birth Date': 0,
});

/** Copies only the required columns, dropping any extra keys a caller passed along. */
const projectRecord = (record: PopulationRecord): PopulationRecord => ({
    KK_NO: record.KK_NO,
    NIK: record.NIK,
    CUSTNAME: record.CUSTNAME,
    JENIS_KELAMIN: record.JENIS_KELAMIN,
    TANGGAL_LAHIR: record.TANGGAL_LAHIR,
    TEMPAT_LAHIR: record.TEMPAT_LAHIR,
});

@singleton()
@injectable()
export class BatchPartitionerService implements IBatchPartitionerService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('BatchPartitionerService initialized.');
    }

    partition(
        records: readonly PopulationRecord[],
        places: ReferencePlaceSet,
        options?: PartitionOptions
    ): BatchResult {
        const referenceDate = options?.referenceDate ?? toLocalCalendarDay(new Date());

        // --- 1. Batch-level precondition: every record carries every column ---
        this.assertRequiredColumns(records);

        this.logger.info(`Partitioning ${records.length} records against ${places.size} reference places.`);

        // --- 2. Classify row by row, keeping input order on both sides ---
        const clean: PopulationRecord[] = [];
        const messy: AnnotatedRecord[] = [];
        const invalidCounts = emptyCounts();

        for (const record of records) {
            const outcome = classifyRecord(record, places, referenceDate);
            const projected = projectRecord(record);

            if (outcome.isClean) {
                clean.push(Object.freeze(projected));
                continue;
            }

            messy.push(Object.freeze({ ...projected, [DESCRIPTION_COLUMN]: outcome.description }));
            for (const name of RULE_NAMES) {
                if (!outcome.results[name]) {
                    invalidCounts[name]++;
                }
            }
        }

        this.logger.info(`Partition complete. Total: ${records.length}, Clean: ${clean.length}, Messy: ${messy.length}`);
        this.logger.debug('Invalid counts per rule:', invalidCounts);

        return Object.freeze({
            clean: Object.freeze(clean),
            messy: Object.freeze(messy),
            invalidCounts: Object.freeze(invalidCounts),
            total: records.length,
        });
    }

    private assertRequiredColumns(records: readonly PopulationRecord[]): void {
        const missing = new Set<string>();
        for (const record of records) {
            for (const column of REQUIRED_COLUMNS) {
                if (!Object.prototype.hasOwnProperty.call(record, column)) {
                    missing.add(column);
                }
            }
        }
        if (missing.size > 0) {
            // Report in canonical column order
            const missingColumns = REQUIRED_COLUMNS.filter(column => missing.has(column));
            this.logger.error(`Batch rejected, missing columns: ${missingColumns.join(', ')}`);
            throw new MissingColumnsError(missingColumns);
        }
    }
}
