// src/infrastructure/webserver/server.ts
import express, { Application, NextFunction, Request, Response } from 'express';
import http from 'http';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../logger';
import { errorHandler } from './middleware/error.middleware';
import { createValidationRouter } from './routes/validation.routes';

@singleton()
@injectable()
export class Server {
    private readonly app: Application;
    private httpServer?: http.Server;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('Initializing Express server...');
        this.app = express();
        this.setupMiddleware();
        this.setupRoutes(); // Setup routes before error handler
        this.setupErrorHandling(); // Setup error handler last
        this.logger.info('Express server initialized.');
    }

    /** The configured Express application, for mounting or in-process testing. */
    public get application(): Application {
        return this.app;
    }

    private setupMiddleware(): void {
        this.app.use(express.json({ limit: '1mb' }));

        this.app.use((req: Request, res: Response, next: NextFunction) => {
            this.logger.http(`Request: ${req.method} ${req.originalUrl}`, { ip: req.ip });
            next();
        });

        this.logger.info('Standard middleware configured.');
    }

    private setupRoutes(): void {
        // Health check
        this.app.get('/health', (req: Request, res: Response) => {
            res.status(200).json({ status: 'UP', timestamp: new Date().toISOString() });
        });

        this.app.use('/api/validation', createValidationRouter());

        this.logger.info('API routes configured.');
    }

    private setupErrorHandling(): void {
        // This MUST be the LAST middleware added
        this.app.use(errorHandler);
        this.logger.info('Error handling middleware configured.');
    }

    public start(port: number): Promise<void> {
         return new Promise((resolve, reject) => {
            this.httpServer = this.app.listen(port, () => {
                this.logger.info(`Server started and listening on http://localhost:${port}`);
                resolve();
            })
            .on('error', (error) => {
                this.logger.error('Failed to start server:', error);
                reject(error);
            });
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            const httpServer = this.httpServer;
            if (!httpServer) {
                this.logger.warn('Server was not running.');
                resolve();
                return;
            }
            this.logger.info('Attempting to gracefully stop the server...');
            httpServer.close((error) => {
                if (error) {
                    this.logger.error('Error stopping server:', error);
                    reject(error);
                    return;
                }
                this.httpServer = undefined;
                this.logger.info('Server stopped successfully.');
                resolve();
            });
        });
    }
}
