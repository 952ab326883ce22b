import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { IResultStore } from '../domain/ports/IResultStore';
import { JsonResultStore } from '../infrastructure/storage/JsonResultStore';
import { createResultRoutes } from './routes/resultRoutes';
import { errorHandler } from './middleware/errorHandler';

/**
 * Creates the read-only viewer application over saved result files.
 */
export function createApp(config: Config, store: IResultStore = new JsonResultStore(config.resultsDir)): Application {
    const app = express();

    // Middleware
    app.use(cors({
        origin: [
            `http://localhost:${config.port}`,
            'http://localhost:8080',
        ],
    }));
    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
        });
    });

    app.use('/', createResultRoutes(store, config.videoBaseUrl));

    // Error handling (must be last)
    app.use(errorHandler);

    return app;
}
