import { Server } from 'http';
import console_stamp from 'console-stamp';
import { createApp } from './app';
import { PORT, SHUTDOWN_TIMEOUT } from './config';
import { serviceRunner } from './services';
import { FusionService, stopFusion } from './services/fusion';
import { LoadFusionConfigService } from './services/loadFusionConfig';
import { NmeaStreamService, stopNmeaStream } from './services/nmeaStream';
import { gnss } from './util/gnss';
import { closeWebSocketServer, createWebSocketServer } from './websockets';

export async function initAppServer(): Promise<Server> {
  try {
    // Setting up logger
    console_stamp(console);
  } catch (e: unknown) {
    console.log(e);
  }

  const app = createApp(gnss);
  const server = new Server(app);
  createWebSocketServer(server);

  await new Promise<void>(resolve => {
    server.listen(PORT, resolve);
  });

  console.log(
    `GNSS fusion API (process ${process.pid}) started and listening on ${PORT}`,
  );

  try {
    serviceRunner.add(LoadFusionConfigService);
    serviceRunner.add(NmeaStreamService);
    serviceRunner.add(FusionService);
    serviceRunner.run();
  } catch (e: unknown) {
    console.log('Error running services:', e);
  }

  process.on('unhandledRejection', reason => {
    console.error('Unhandled Promise Rejection:', reason);
  });

  let isShuttingDown = false;

  async function gracefulShutdown(signal: string, err?: Error) {
    if (isShuttingDown) {
      console.log('Shutdown already in progress. Please wait...');
      return;
    }
    isShuttingDown = true;

    if (err) {
      console.error('Uncaught Exception:', err);
    } else {
      console.log(`${signal} signal received. Shutting down gracefully...`);
    }

    const timeout = setTimeout(() => {
      console.log('Forcefully shutting down.');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT);

    try {
      serviceRunner.stop();
      stopFusion();
      stopNmeaStream();

      await closeWebSocketServer();

      await new Promise<void>((resolve, reject) => {
        server.close(err => {
          clearTimeout(timeout);
          if (err) {
            console.error('Error closing HTTP server:', err);
            reject(err);
          } else {
            console.log('HTTP server closed successfully');
            resolve();
          }
        });
      });

      console.log('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      console.error('Error during graceful shutdown:', error);
      process.exit(1);
    }
  }

  process.on('uncaughtException', err => {
    void gracefulShutdown('UncaughtException', err);
  });

  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });

  return server;
}

if (require.main === module) {
  initAppServer().catch((e: unknown) => {
    console.error('Failed to start GNSS fusion API:', e);
    process.exit(1);
  });
}
