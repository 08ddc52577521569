import * as XLSX from 'xlsx';
import { PopulationRecord, ReferencePlaceSet } from '../../src/core/common/interfaces/models';
import { buildReferencePlaceSet } from '../../src/core/validation/reference-places';

/** Fixed "today" used by every rule test: 1 June 2024. */
export const REFERENCE_DATE = new Date(Date.UTC(2024, 5, 1, 12));

export const PLACES: ReferencePlaceSet = buildReferencePlaceSet(['JAKARTA', 'BANDUNG', 'SURABAYA']);

export function validRecord(overrides: Partial<PopulationRecord> = {}): PopulationRecord {
    return {
        KK_NO: '3201012345671234',
        NIK: '3174019876545678',
        CUSTNAME: 'Siti Rahmawati',
        JENIS_KELAMIN: 'PEREMPUAN',
        TANGGAL_LAHIR: '17/08/1990',
        TEMPAT_LAHIR: 'Jakarta',
        ...overrides,
    };
}

/** Builds an .xlsx buffer with one sheet per entry, rows given as arrays. */
export function workbookBuffer(sheets: Record<string, unknown[][]>): Buffer {
    const workbook = XLSX.utils.book_new();
    for (const [name, rows] of Object.entries(sheets)) {
        XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
    }
    return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

export const HEADER = ['KK_NO', 'NIK', 'CUSTNAME', 'JENIS_KELAMIN', 'TANGGAL_LAHIR', 'TEMPAT_LAHIR'];
