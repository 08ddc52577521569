// src/infrastructure/webserver/routes/validation.routes.ts
import { Router } from 'express';
import { container } from 'tsyringe';
import { ValidationController } from '../controllers/validation.controller';
import { uploadValidationFiles } from '../middleware/upload.middleware';

/** Builds the router; the controller is resolved when the server is constructed. */
export function createValidationRouter(): Router {
    const router = Router();
    const validationController = container.resolve(ValidationController);

    // POST /api/validation - Upload records + city list, get summary and samples as JSON
    router.post(
        '/',
        uploadValidationFiles,
        validationController.handleValidate
    );

    // POST /api/validation/report - Same uploads, download the Summary/Clean/Messy workbook
    router.post(
        '/report',
        uploadValidationFiles,
        validationController.handleReport
    );

    return router;
}
