import { Command } from 'commander';
import { createAppContext } from '../../context.js';
import { startHttpServer } from '../../http/server.js';
import { parseNumberOption } from '../format.js';

export const serveCommand = new Command('serve')
  .description('Start the HTTP API')
  .option('--port <n>', 'Port (default from COLMATCH_HTTP_PORT)', parseNumberOption)
  .option('--host <host>', 'Host (default from COLMATCH_HTTP_HOST)')
  .action(async (options: { port?: number; host?: string }) => {
    const context = createAppContext();
    await startHttpServer({
      ...context,
      config: {
        ...context.config,
        httpPort: options.port ?? context.config.httpPort,
        httpHost: options.host ?? context.config.httpHost,
      },
    });
  });
