//src/register.ts

import { container } from "tsyringe";
import { FileParserService } from "./core/parsing";
import { ReportGeneratorService } from "./core/reporting";
import { BatchPartitionerService } from "./core/validation";
import loggerInstance, { LOGGER_TOKEN } from "./infrastructure/logger";
import { ValidationController } from "./infrastructure/webserver/controllers/validation.controller";
import { Server } from "./infrastructure/webserver/server";


export function registerDependencies(): void {
    // IMPORTANT: Register Logger FIRST
    container.register(LOGGER_TOKEN, {
        useValue: loggerInstance
    });
    loggerInstance.debug("Registered: LOGGER_TOKEN");

    // Register Core Services
    container.registerSingleton(FileParserService);
    container.registerSingleton(BatchPartitionerService);
    container.registerSingleton(ReportGeneratorService);
    loggerInstance.debug("Registered: FileParserService, BatchPartitionerService, ReportGeneratorService (Singleton)");

    // Register Web Layer
    container.registerSingleton(ValidationController);
    container.registerSingleton(Server);
    loggerInstance.debug("Registered: ValidationController, Server (Singleton)");

    loggerInstance.debug("--- Dependency Registration Complete ---");
}
