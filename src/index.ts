import 'module-alias/register';
import 'dotenv/config';
import { ConfigurationError } from '@shared/errors';
import { createApp } from './app';
import { createServices } from './bootstrap';
import { loadConfig, type AppConfig } from './config';

let config: AppConfig;
try {
    config = loadConfig();
} catch (error) {
    if (error instanceof ConfigurationError) {
        console.error(`[SERVER] Configuration error: ${error.message}`);
        process.exit(1);
    }
    throw error;
}

const app = createApp(createServices(config));

app.listen(config.port, () => {
    console.log(`[SERVER] Listening on port ${config.port} (images: ${config.imageProvider}, output: ${config.outputDir})`);
});
