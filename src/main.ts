// src/main.ts

import 'reflect-metadata';
import config from './config';
import { registerDependencies } from './register';

// === REGISTER DEPENDENCIES IMMEDIATELY ===
registerDependencies();
// ==========================================

import { container } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from './infrastructure/logger';
import { Server } from './infrastructure/webserver/server';

async function bootstrap(): Promise<void> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    try {
        logger.info('-------------------- Configuration Loaded --------------------');
        logger.info(`NODE_ENV: ${config.nodeEnv}`);
        logger.info(`PORT: ${config.port}`);
        logger.info(`LOG_LEVEL: ${config.logLevel}`);
        logger.info(`Upload limit: ${config.upload.maxFileSizeBytes} bytes`);
        logger.info(`Accepted genders: ${config.validation.acceptedGenders.join(' | ')}`);
        logger.info(`Response sample size: ${config.validation.sampleSize}`);
        logger.info('--------------------------------------------------------------');

        logger.info('Resolving main application server...');
        const server = container.resolve(Server);

        logger.info('Starting HTTP server...');
        await server.start(config.port);
        logger.info(`Server listening successfully on port ${config.port}`);
    } catch (error) {
        if (error instanceof Error) {
            logger.error('Failed to bootstrap application:', { message: error.message, stack: error.stack });
        } else {
            logger.error('Failed to bootstrap application with unknown error:', error);
        }
        process.exit(1);
    }
}

async function gracefulShutdown(signal: string): Promise<void> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const server = container.resolve(Server); // Singleton

    logger.warn(`Received ${signal}. Initiating graceful shutdown...`);

    try {
        await server.stop();
        logger.info('Application shut down gracefully.');
        process.exit(0);
    } catch (error) {
        logger.error('Error during graceful shutdown:', error);
        process.exit(1);
    }
}

// Listen for termination signals
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT')); // Catches Ctrl+C

// Start the application
void bootstrap();
