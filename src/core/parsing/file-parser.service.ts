// src/core/parsing/file-parser.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import * as XLSX from 'xlsx';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError, FileParsingError, MissingColumnsError } from '../common/errors';
import { PopulationRecord, REQUIRED_COLUMNS, ReferencePlaceSet, RequiredColumn } from '../common/interfaces/models';
import { formatDateToDDMMYYYY, parseDayMonthYear, toLocalCalendarDay } from '../common/utils';
import { buildReferencePlaceSet, CITY_COLUMN } from '../validation/reference-places';
import { IFileParserService, RecordParsingOptions } from './interfaces/services';

type TextCell = string | null;

/**
 * Converts a SheetJS cell to text. Date cells are built by SheetJS in local
 * time, so their local calendar fields are the ones shown in the sheet.
 */
function cellToText(value: unknown): TextCell {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') return value;
    if (value instanceof Date) {
        if (isNaN(value.getTime())) return null;
        return formatDateToDDMMYYYY(toLocalCalendarDay(value));
    }
    return String(value);
}

/**
 * Re-renders D/M/YYYY birth dates as zero-padded DD/MM/YYYY. Anything else is
 * returned untouched so that failure descriptions quote what the sheet held.
 */
function normalizeBirthDate(value: TextCell): TextCell {
    if (value === null) return null;
    const parsed = parseDayMonthYear(value);
    return parsed ? formatDateToDDMMYYYY(parsed) : value;
}

function readWorkbook(buffer: Buffer, opts: XLSX.ParsingOptions): XLSX.WorkBook {
    try {
        return XLSX.read(buffer, { type: 'buffer', ...opts });
    } catch (error) {
        throw new FileParsingError('Unable to read workbook', error instanceof Error ? error : undefined);
    }
}

function sheetRows(worksheet: XLSX.WorkSheet): unknown[][] {
    // header: 1 yields arrays, first one being the header row
    return XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: true, defval: null, blankrows: false });
}

function headerNames(row: unknown[] | undefined): string[] {
    return (row ?? []).map(cell => (cellToText(cell) ?? '').trim());
}


@singleton()
@injectable()
export class FileParserService implements IFileParserService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('FileParserService initialized.');
    }

    parseRecords(fileBuffer: Buffer, options?: RecordParsingOptions): PopulationRecord[] {
        this.logger.debug('Parsing records workbook...');
        try {
            const workbook = readWorkbook(fileBuffer, { cellDates: true });
            const sheetNames = options?.sheetNames ?? workbook.SheetNames;
            if (sheetNames.length === 0) {
                throw new FileParsingError('No sheets found in the Excel workbook.');
            }

            // --- 1. Collect header + rows per sheet ---
            const sheets = sheetNames.map(name => {
                const worksheet = workbook.Sheets[name];
                if (!worksheet) { throw new FileParsingError(`Sheet "${name}" not found.`); }
                const [header, ...rows] = sheetRows(worksheet);
                return { name, header: headerNames(header), rows };
            });

            // --- 2. Schema check on the union of headers, before any row is projected ---
            const seen = new Set(sheets.flatMap(sheet => sheet.header));
            const missing = REQUIRED_COLUMNS.filter(column => !seen.has(column));
            if (missing.length > 0) {
                throw new MissingColumnsError(missing);
            }

            // --- 3. Project rows onto the required columns, in sheet order ---
            const records: PopulationRecord[] = [];
            for (const sheet of sheets) {
                const indexOf = (column: RequiredColumn): number => sheet.header.indexOf(column);
                const columnIndex = new Map(REQUIRED_COLUMNS.map(column => [column, indexOf(column)] as const));
                const text = (row: unknown[], column: RequiredColumn): TextCell => {
                    const index = columnIndex.get(column) ?? -1;
                    // A sheet lacking a column contributes empty cells, as a concatenated table would
                    return index < 0 ? null : cellToText(row[index]);
                };

                for (const row of sheet.rows) {
                    records.push({
                        KK_NO: text(row, 'KK_NO'),
                        NIK: text(row, 'NIK'),
                        CUSTNAME: text(row, 'CUSTNAME'),
                        JENIS_KELAMIN: text(row, 'JENIS_KELAMIN'),
                        TANGGAL_LAHIR: normalizeBirthDate(text(row, 'TANGGAL_LAHIR')),
                        TEMPAT_LAHIR: text(row, 'TEMPAT_LAHIR'),
                    });
                }
                this.logger.info(`Parsed ${sheet.rows.length} rows from sheet "${sheet.name}".`);
            }

            this.logger.info(`Parsed total ${records.length} records from ${sheets.length} sheet(s).`);
            return records;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(`Records parsing failed: ${message}`);
            if (error instanceof AppError) { // Keep specific errors
                throw error;
            }
            throw new FileParsingError('Failed to parse records workbook', error instanceof Error ? error : undefined);
        }
    }

    parseReferencePlaces(fileBuffer: Buffer): ReferencePlaceSet {
        this.logger.debug('Parsing reference city list...');
        // raw: true keeps CSV text as text instead of guessing numbers and dates
        const workbook = readWorkbook(fileBuffer, { raw: true });
        const firstSheetName = workbook.SheetNames[0];
        const worksheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
        if (!worksheet) {
            throw new FileParsingError('City list contains no sheet.');
        }

        const [header, ...rows] = sheetRows(worksheet);
        if (!header) {
            throw new FileParsingError('City list is empty.');
        }

        const cityIndex = headerNames(header).indexOf(CITY_COLUMN);
        const columnIndex = cityIndex >= 0 ? cityIndex : 0;
        if (cityIndex < 0) {
            this.logger.warn(`City list has no ${CITY_COLUMN} column, using its first column.`);
        }

        const places = buildReferencePlaceSet(rows.map(row => cellToText(row[columnIndex])));
        this.logger.info(`Loaded ${places.size} reference places from ${rows.length} rows.`);
        return places;
    }
}
