// src/core/reporting/report-generator.service.ts
import ExcelJS, { Row, Workbook, Worksheet } from 'exceljs';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError } from '../common/errors';
import {
    BatchResult,
    CellValue,
    DESCRIPTION_COLUMN,
    PopulationRecord,
    REQUIRED_COLUMNS
} from '../common/interfaces/models';
import { formatPercentage } from '../common/utils';
import { displayFieldInput, RULE_NAMES, toFieldInput } from '../validation/field-rules';
import { IReportGeneratorService, ValidationSummary } from './interfaces/services';

const COUNT_FORMAT = '#,##0';
const HEADER_FILL = 'FF1F4E79';

/** Report cells are text; missing values stay empty rather than becoming "". */
const toReportCell = (value: CellValue): string | null => {
    const input = toFieldInput(value);
    return input.kind === 'missing' ? null : displayFieldInput(input);
};

const recordRow = (record: PopulationRecord): (string | null)[] =>
    REQUIRED_COLUMNS.map(column => toReportCell(record[column]));

@singleton()
@injectable()
export class ReportGeneratorService implements IReportGeneratorService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('ReportGeneratorService initialized.');
    }

    buildSummary(result: BatchResult): ValidationSummary {
        const clean = result.clean.length;
        const messy = result.messy.length;
        return {
            total: result.total,
            clean,
            messy,
            cleanPercentage: formatPercentage(clean, result.total),
            messyPercentage: formatPercentage(messy, result.total),
            breakdown: RULE_NAMES.map(category => ({ category, count: result.invalidCounts[category] })),
        };
    }

    async generateReport(result: BatchResult): Promise<Buffer> {
        this.logger.info('Generating validation Excel report...');
        try {
            const workbook = new ExcelJS.Workbook();
            this.setWorkbookProperties(workbook);
            this.createSummarySheet(workbook, result);
            this.createCleanSheet(workbook, result);
            this.createMessySheet(workbook, result);

            const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
            this.logger.info('Excel report generated successfully.');
            return buffer;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error('Failed to generate Excel report:', { message, stack: error instanceof Error ? error.stack : undefined });
            if (error instanceof AppError) throw error;
            throw new AppError('ReportGenerationError', 'Failed to generate Excel report', 500, false);
        }
    }

    private setWorkbookProperties(workbook: Workbook): void {
        workbook.creator = 'Registry Record Validator';
        workbook.created = new Date();
        workbook.modified = new Date();
    }

    private createSummarySheet(workbook: Workbook, result: BatchResult): void {
        const sheet = workbook.addWorksheet('Summary');
        const headers = ['Metric', 'Count'];
        this.styleHeaderRow(sheet.addRow(headers), headers);

        const rows: [string, number][] = [
            ['Total', result.total],
            ['Clean', result.clean.length],
            ['Messy', result.messy.length],
        ];
        rows.forEach(values => {
            sheet.addRow(values).getCell(2).numFmt = COUNT_FORMAT;
        });

        this.autoFitColumns(sheet, headers);
    }

    private createCleanSheet(workbook: Workbook, result: BatchResult): void {
        const sheet = workbook.addWorksheet('Clean');
        const headers = [...REQUIRED_COLUMNS];
        this.styleHeaderRow(sheet.addRow(headers), headers);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        result.clean.forEach(record => sheet.addRow(recordRow(record)));

        this.autoFitColumns(sheet, headers);
    }

    private createMessySheet(workbook: Workbook, result: BatchResult): void {
        const sheet = workbook.addWorksheet('Messy');
        const headers = [...REQUIRED_COLUMNS, DESCRIPTION_COLUMN];
        this.styleHeaderRow(sheet.addRow(headers), headers);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        result.messy.forEach(record => sheet.addRow([...recordRow(record), record[DESCRIPTION_COLUMN]]));

        this.autoFitColumns(sheet, headers);
    }

    private styleHeaderRow(row: Row, headers: string[]): void {
        for (let i = 1; i <= headers.length; i++) {
            const cell = row.getCell(i);

            cell.font = {
                bold: true,
                color: { argb: 'FFFFFFFF' }  // White text
            };
            cell.alignment = { vertical: 'middle', horizontal: 'center', wrapText: true };
            cell.fill = {
                type: 'pattern',
                pattern: 'solid',
                fgColor: { argb: HEADER_FILL }
            };
            cell.border = {
                top: { style: 'thin' },
                left: { style: 'thin' },
                bottom: { style: 'thin' },
                right: { style: 'thin' }
            };
        }
    }

    /** Auto-fits column widths based on header and the first rows of data */
    private autoFitColumns(sheet: Worksheet, headers: string[]): void {
        const scanRowCount = 21;
        headers.forEach((header, i) => {
            const column = sheet.getColumn(i + 1);
            let maxLength = header.length;
            column.eachCell({ includeEmpty: false }, (cell, rowNumber) => {
                if (rowNumber > scanRowCount) return;
                const length = cell.value === null || cell.value === undefined ? 0 : String(cell.value).length;
                if (length > maxLength) {
                    maxLength = length;
                }
            });
            column.width = Math.min(maxLength + 2, 80);
        });
    }
}
