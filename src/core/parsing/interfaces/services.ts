// src/core/parsing/interfaces/services.ts
import { PopulationRecord, ReferencePlaceSet } from '../../common/interfaces/models';

/** Options for reading the records workbook */
export interface RecordParsingOptions {
    /** Restrict reading to these sheets. Default: every sheet, in workbook order. */
    sheetNames?: string[];
}

/** Defines the contract for the File Parser Service */
export interface IFileParserService {
    /**
     * Reads registry rows from an Excel workbook and projects them onto the required columns.
     * @throws {MissingColumnsError} If the combined sheet headers lack a required column.
     * @throws {FileParsingError} If the buffer cannot be read as a workbook.
     */
    parseRecords(fileBuffer: Buffer, options?: RecordParsingOptions): PopulationRecord[];

    /**
     * Reads a city list (CSV or workbook) into the normalized set of accepted birthplaces.
     * @throws {FileParsingError} If the buffer cannot be read or holds no header row.
     */
    parseReferencePlaces(fileBuffer: Buffer): ReferencePlaceSet;
}
