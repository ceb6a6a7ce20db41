/**
 * Status HTTP server
 */

import express from 'express';
import cors from 'cors';
import { createStatusRouter, type StatusRouterDeps } from './routes/status.js';

export function createApp(deps: StatusRouterDeps): express.Express {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    // API routes
    app.use('/api/v1', createStatusRouter(deps));

    return app;
}
