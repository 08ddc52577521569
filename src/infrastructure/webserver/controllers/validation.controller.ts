// src/infrastructure/webserver/controllers/validation.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../../config';
import { ValidationError } from '../../../core/common/errors';
import { BatchResult } from '../../../core/common/interfaces/models';
import { generateUniqueId, toLocalCalendarDay } from '../../../core/common/utils';
import { FileParserService } from '../../../core/parsing';
import { ReportGeneratorService } from '../../../core/reporting';
import { BatchPartitionerService } from '../../../core/validation';
import { LOGGER_TOKEN } from '../../logger';

const REPORT_FILENAME = 'validation_report.xlsx';
const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

interface UploadPair {
    records: Express.Multer.File;
    cities: Express.Multer.File;
}

@singleton()
@injectable()
export class ValidationController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(FileParserService) private fileParser: FileParserService,
        @inject(BatchPartitionerService) private partitioner: BatchPartitionerService,
        @inject(ReportGeneratorService) private reporter: ReportGeneratorService
    ) {
        this.logger.info('ValidationController initialized.');
    }

    /**
     * Validates the uploaded workbook and returns summary, per-rule counts and
     * a sample of each partition as JSON.
     */
    public handleValidate = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        this.logger.info('Received request to validate uploaded records.');
        try {
            const { runId, result } = this.runValidation(req);
            const sampleSize = config.validation.sampleSize;

            res.status(200).json({
                runId,
                summary: this.reporter.buildSummary(result),
                invalidCounts: result.invalidCounts,
                samples: {
                    clean: result.clean.slice(0, sampleSize),
                    messy: result.messy.slice(0, sampleSize),
                },
            });
            this.logger.info(`[${runId}] Validation results sent.`);
        } catch (error) {
            this.logger.error('Error during handleValidate:', {
                message: error instanceof Error ? error.message : String(error),
                stack: error instanceof Error ? error.stack : undefined,
            });
            next(error);
        }
    };

    /**
     * Validates the uploaded workbook and responds with the Summary/Clean/Messy workbook.
     */
    public handleReport = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        this.logger.info('Received request to export validation report.');
        try {
            const { runId, result } = this.runValidation(req);
            const reportBuffer = await this.reporter.generateReport(result);

            res.setHeader('Content-Disposition', `attachment; filename="${REPORT_FILENAME}"`);
            res.setHeader('Content-Type', XLSX_MIME);
            res.send(reportBuffer);
            this.logger.info(`[${runId}] Exported report ${REPORT_FILENAME}`);
        } catch (error) {
            this.logger.error('Error during report export handling.', {
                message: error instanceof Error ? error.message : String(error),
            });
            next(error);
        }
    };

    /** Parses both uploads and partitions the batch. Reference date is the server's local day at request time. */
    private runValidation(req: Request): { runId: string; result: BatchResult } {
        const files = this.requireUploads(req);
        const runId = generateUniqueId();
        this.logger.info(`[${runId}] Validating ${files.records.originalname} against ${files.cities.originalname}.`);

        const places = this.fileParser.parseReferencePlaces(files.cities.buffer);
        const records = this.fileParser.parseRecords(files.records.buffer);
        const result = this.partitioner.partition(records, places, { referenceDate: toLocalCalendarDay(new Date()) });

        return { runId, result };
    }

    private requireUploads(req: Request): UploadPair {
        const files = req.files;
        if (!files || Array.isArray(files)) {
            throw new ValidationError('Upload the records workbook ("records") and the city list ("cities").');
        }
        const records = files['records']?.[0];
        const cities = files['cities']?.[0];
        if (!records) {
            throw new ValidationError('A records workbook ("records") is required.');
        }
        if (!cities) {
            throw new ValidationError('A city list file ("cities") is required.');
        }
        return { records, cities };
    }
}
