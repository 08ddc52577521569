// src/core/validation/interfaces/services.ts
import { BatchResult, PopulationRecord, ReferencePlaceSet } from '../../common/interfaces/models';

export interface PartitionOptions {
    /** "Today" for the birth-date rule. Compared by UTC calendar day; defaults to the server's local day at call time. */
    referenceDate?: Date;
}

export interface IBatchPartitionerService {
    /**
     * Classifies every record and splits the batch into clean and messy subsets.
     * @param records - Ordered batch; relative order is kept in both outputs.
     * @param places - Normalized birthplace names accepted by the place rule.
     * @returns Frozen result whose clean and messy sizes sum to the batch size.
     * @throws {MissingColumnsError} If any record lacks a required column. No record is classified in that case.
     */
    partition(
        records: readonly PopulationRecord[],
        places: ReferencePlaceSet,
        options?: PartitionOptions
    ): BatchResult;
}
