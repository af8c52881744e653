import type { Express } from 'express';
import type { Server } from 'node:http';

interface StartServerOptions {
  app: Express;
  port: number;
  onShutdown?: () => Promise<void>;
}

export const startServer = ({ app, port, onShutdown }: StartServerOptions): Server => {
  const server = app.listen(port, () => console.log(`UV exposure engine listening on ${port}`));
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`Received ${signal}. Shutting down...`);

    setTimeout(() => {
      console.error('Shutdown timeout reached, forcing exit.');
      process.exit(1);
    }, 10000).unref();

    const drain = onShutdown ? onShutdown() : Promise.resolve();
    drain
      .catch((error: unknown) => {
        console.error('Session shutdown failed:', error);
      })
      .finally(() => {
        server.close((err) => {
          if (err) {
            console.error('Graceful shutdown failed:', err);
            process.exit(1);
          }
          process.exit(0);
        });
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
  });
  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error);
    shutdown('uncaughtException');
  });

  return server;
};
