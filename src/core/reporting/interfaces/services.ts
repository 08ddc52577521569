// src/core/reporting/interfaces/services.ts
import { BatchResult, RuleName } from '../../common/interfaces/models';

/** One bar of the invalid-data breakdown */
export interface InvalidBreakdownRow {
    category: RuleName;
    count: number;
}

/** Headline numbers of a validation run */
export interface ValidationSummary {
    total: number;
    clean: number;
    messy: number;
    /** One-decimal share of the total, e.g. "66.7%"; "N/A" for an empty batch */
    cleanPercentage: string;
    messyPercentage: string;
    breakdown: InvalidBreakdownRow[];
}

/** Defines the contract for the Report Generator Service */
export interface IReportGeneratorService {
    /** Derives the headline counts and percentages from a batch result. */
    buildSummary(result: BatchResult): ValidationSummary;

    /**
     * Generates an Excel workbook with Summary, Clean and Messy sheets.
     * @returns A promise resolving to a Buffer containing the .xlsx content.
     */
    generateReport(result: BatchResult): Promise<Buffer>;
}
