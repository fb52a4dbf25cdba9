/**
 * Process entry point: load configuration and start the HTTP server.
 */

import { loadConfig } from './config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

const config = loadConfig();
setLogLevel(config.logLevel);

const app = createApp(createAppContext({ config }));

app.listen(config.port, () => {
  logger.info('Server listening', { port: config.port, maxSteps: config.maxSteps });
});
