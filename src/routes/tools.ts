import { Router } from 'express';
import { ValidationError } from '@shared/errors';
import { isRecord } from '@shared/utils/typeGuards';
import { TOOL_NAMES, isToolName, type ToolHandler, type ToolName } from '../services/tools';
import { abortOnClientClose } from '../utils/requestSignal';

/**
 * `POST /mcp` with `{ tool, args }`: one call into the tool-invocation contract.
 */
export function createToolsRouter(tools: Record<ToolName, ToolHandler>): Router {
    const router = Router();

    router.post('/mcp', async (req, res, next) => {
        try {
            const body: unknown = req.body;
            const tool = isRecord(body) ? body.tool : undefined;
            if (!isToolName(tool)) {
                throw new ValidationError(`Unknown tool: ${String(tool)}`, [`'tool' must be one of ${TOOL_NAMES.join(', ')}`]);
            }

            const signal = abortOnClientClose(res);
            console.log(`[SERVER] Tool call ${tool}`);
            const result = await tools[tool](isRecord(body) ? body.args : undefined, signal);
            res.json({ tool, return: result });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
