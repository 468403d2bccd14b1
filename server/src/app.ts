import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { AppServices } from './services/recommendations/index.js';
import { createV1Router } from './routes/v1/index.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware, notFoundMiddleware } from './middleware/error.middleware.js';

export function createApp(services: AppServices) {
    const app = express();
    app.use(helmet());
    app.use(compression());
    app.use(express.json({ limit: '1mb' }));
    app.use(cors());

    // Request context & logging (BEFORE routes)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);

    app.use('/api/v1', createV1Router(services));

    app.get('/healthz', (_req, res) => res.status(200).send('ok'));

    app.use(notFoundMiddleware);
    app.use(errorMiddleware);

    return app;
}
