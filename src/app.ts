import express from 'express';
import cors from 'cors';
import { errorHandler } from './middleware/errorHandler';
import { createDownloadRouter } from './routes/download';
import { createGenerateRouter } from './routes/generate';
import { createToolsRouter } from './routes/tools';
import type { PipelineOrchestrator } from './services/pipeline';
import type { ToolHandler, ToolName } from './services/tools';

export interface AppServices {
    pipeline: PipelineOrchestrator;
    tools: Record<ToolName, ToolHandler>;
    outputDir: string;
}

export function createApp(services: AppServices): express.Express {
    const app = express();

    // Middleware
    app.use(cors({ origin: true, methods: ['GET', 'POST'] }));
    app.use(express.json({ limit: '25mb' }));

    // Routes
    app.get('/health', (_req, res) => {
        res.json({ status: 'ok' });
    });
    app.use(createGenerateRouter(services.pipeline));
    app.use(createToolsRouter(services.tools));
    app.use(createDownloadRouter(services.outputDir));

    app.use((req, res) => {
        res.status(404).json({ error: `Cannot ${req.method} ${req.path}` });
    });
    app.use(errorHandler);

    return app;
}
