import express, { type Express } from 'express';
import { createServer as createHttpServer, type Server } from 'node:http';
import { createServer as createHttpsServer } from 'node:https';
import { readFile, stat } from 'node:fs/promises';
import { logger } from '../logger.js';
import { InvalidDirectoryError, ServeError, formatError } from '../errors.js';

export interface StaticServerConfig {
  port: number;
  directory: string;
  host?: string;
  cert?: string; // Path to the TLS certificate
  key?: string; // Path to the TLS key
}

export interface ShutdownResult {
  /** False when connections were still open at the deadline and had to be force-closed. */
  drained: boolean;
}

/** What the orchestrator needs from the file server. */
export interface FileServer {
  listenAndServe(): Promise<void>;
  shutdown(deadlineMs: number): Promise<ShutdownResult>;
  /** Drop every open connection now, ending a pending shutdown early. */
  forceClose(): void;
}

const PLAYLIST_EXTENSIONS = ['.m3u8', '.mpd'];

export function createStaticApp(directory: string): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use((_req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    next();
  });

  app.use(express.static(directory, {
    index: false,
    dotfiles: 'ignore',
    setHeaders: (res, filePath) => {
      // Playlists change with every segment; segments never do
      if (PLAYLIST_EXTENSIONS.some((ext) => filePath.endsWith(ext))) {
        res.setHeader('Cache-Control', 'no-cache');
      }
    },
  }));

  app.use((_req, res) => {
    res.status(404).send('Not Found');
  });

  return app;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** Serves the muxer's output directory over HTTP, or HTTPS when a cert and key are configured. */
export class StaticServer implements FileServer {
  private server: Server | null = null;
  private started = false;
  private closing = false;
  private forced = false;
  private shutdownResult: Promise<ShutdownResult> | null = null;

  constructor(private config: StaticServerConfig) {}

  get tls(): boolean {
    return Boolean(this.config.cert && this.config.key);
  }

  /** Bound port, or null while not listening. */
  address(): number | null {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr.port : null;
  }

  async listenAndServe(): Promise<void> {
    if (this.started) {
      throw new ServeError('Server already started');
    }
    this.started = true;

    if (!(await isDirectory(this.config.directory))) {
      throw new InvalidDirectoryError(this.config.directory);
    }

    const app = createStaticApp(this.config.directory);
    let server: Server;
    if (this.config.cert && this.config.key) {
      try {
        const [cert, key] = await Promise.all([readFile(this.config.cert), readFile(this.config.key)]);
        server = createHttpsServer({ cert, key }, app);
      } catch (err) {
        throw new ServeError('Failed to load TLS certificate', err);
      }
    } else {
      server = createHttpServer(app);
    }

    // Shut down while the directory check or certificate load was pending
    if (this.closing) return;
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', (err) => {
        reject(new ServeError(`Server failed: ${err.message}`, err));
      });
      server.once('close', () => resolve());
      server.listen(this.config.port, this.config.host, () => {
        const scheme = this.tls ? 'https' : 'http';
        logger.info(`Serving ${this.config.directory} on ${scheme}://${this.config.host ?? 'localhost'}:${this.address() ?? this.config.port}`);
      });
    });
  }

  /**
   * Stop accepting connections, give in-flight requests until the deadline,
   * then force-close whatever is left. Every call returns the same result.
   */
  shutdown(deadlineMs: number): Promise<ShutdownResult> {
    this.closing = true;
    this.shutdownResult ??= this.close(deadlineMs);
    return this.shutdownResult;
  }

  forceClose(): void {
    this.forced = true;
    this.server?.closeAllConnections();
  }

  private close(deadlineMs: number): Promise<ShutdownResult> {
    const server = this.server;
    if (!server) {
      return Promise.resolve({ drained: true });
    }
    if (!server.listening) {
      // Still binding: close as soon as the socket is up
      server.once('listening', () => server.close());
      return Promise.resolve({ drained: true });
    }

    return new Promise((resolve) => {
      const timeout = setTimeout(() => {
        logger.warn(`Server did not drain within ${deadlineMs}ms, closing remaining connections`);
        server.closeAllConnections();
        resolve({ drained: false });
      }, deadlineMs);

      server.close((err) => {
        clearTimeout(timeout);
        if (err) logger.warn(`Error closing server: ${formatError(err)}`);
        resolve({ drained: !this.forced });
      });
      server.closeIdleConnections();
    });
  }
}
