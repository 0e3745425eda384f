import debug, { configureLogging } from '../util/debug.js';
import { loadAppConfig } from './config.js';
import { createDispatcher } from './mcp/dispatcher.js';
import { createHttpApp } from './mcp/http.js';
import { createDuckDuckGoSearch } from './search/duckduckgo.js';

const appConfig = loadAppConfig();
configureLogging(appConfig.logging.namespaces);

const { host, port } = appConfig.server;
const serverInfo = appConfig.app;

const search = createDuckDuckGoSearch();
const dispatcher = createDispatcher({ search, serverInfo });
const app = createHttpApp({ dispatcher, search, serverInfo });

const server = app.listen(port, host, error => {
  if (error) {
    debug.error(`Failed to start ${serverInfo.name}`, error);
    process.exit(1);
  }
  debug.app(`${serverInfo.name} v${serverInfo.version} listening on ${host}:${port}`);
});

const shutdown = (signal: NodeJS.Signals) => {
  debug.app(`Received ${signal}, shutting down`);
  server.close(error => {
    if (error) {
      debug.error('Failed to close HTTP server', error);
      process.exitCode = 1;
    }
  });
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
