// src/infrastructure/webserver/middleware/upload.middleware.ts
import { Request } from 'express';
import multer from 'multer';
import config from '../../../config';
import { FileParsingError } from '../../../core/common/errors';

// Configure multer for memory storage (files are parsed then discarded)
const storage = multer.memoryStorage();

const RECORDS_MIMES = [
    'application/vnd.ms-excel', // .xls
    'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet', // .xlsx
];

const CITY_LIST_MIMES = [
    ...RECORDS_MIMES,
    'text/csv',
    'text/plain', // .txt
    'application/csv',
];

/** Accepts workbooks for "records" and CSV/text or workbooks for "cities". */
export const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
    const allowed = file.fieldname === 'cities' ? CITY_LIST_MIMES : RECORDS_MIMES;
    if (allowed.includes(file.mimetype)) {
        cb(null, true);
    } else {
        cb(new FileParsingError(`Invalid file type for "${file.fieldname}": ${file.mimetype}.`));
    }
};

// Configure multer instance
const upload = multer({
    storage: storage,
    fileFilter: fileFilter,
    limits: {
        fileSize: config.upload.maxFileSizeBytes,
    }
});

/**
 * Middleware to handle the two validation uploads.
 * Expects fields named 'records' (registry workbook) and 'cities' (reference city list).
 */
export const uploadValidationFiles = upload.fields([
    { name: 'records', maxCount: 1 },
    { name: 'cities', maxCount: 1 }
]);
