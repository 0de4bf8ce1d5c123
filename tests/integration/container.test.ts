import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import { ContainerManager } from '../../src/docker/container.js';

type Handler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

/** Minimal Docker Engine API stand-in served on a unix socket. */
class FakeDaemon {
  readonly requests: string[] = [];
  private readonly server: http.Server;

  constructor(private readonly routes: Record<string, Handler>) {
    this.server = http.createServer((req, res) => {
      const { pathname } = new URL(req.url ?? '/', 'http://docker');
      const key = `${req.method} ${pathname}`;
      this.requests.push(key);
      req.resume();
      req.on('end', () => {
        const handler = this.routes[key];
        if (handler) {
          handler(req, res);
        } else {
          reply(res, 404, { message: `no route for ${key}` });
        }
      });
    });
  }

  listen(socketPath: string): Promise<void> {
    return new Promise((resolve) => this.server.listen(socketPath, resolve));
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.server.close(() => resolve());
      this.server.closeAllConnections();
    });
  }
}

function reply(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

describe('ContainerManager', () => {
  let tempDir: string;
  let socketPath: string;
  let daemon: FakeDaemon | undefined;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pf-docker-'));
    socketPath = path.join(tempDir, 'docker.sock');
  });

  afterEach(async () => {
    await daemon?.close();
    daemon = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  async function start(routes: Record<string, Handler>): Promise<FakeDaemon> {
    daemon = new FakeDaemon(routes);
    await daemon.listen(socketPath);
    return daemon;
  }

  it('removes the created container when attaching fails', async () => {
    const fake = await start({
      'POST /containers/create': (_req, res) => reply(res, 201, { Id: 'c1', Warnings: [] }),
      'POST /containers/c1/attach': (_req, res) =>
        reply(res, 500, { message: 'attach failed' }),
      'DELETE /containers/c1': (_req, res) => {
        res.writeHead(204);
        res.end();
      },
    });
    const manager = new ContainerManager(socketPath);

    await expect(
      manager.runCommand('golang:1.22', ['go', 'version'], { workDir: '/workspace' }),
    ).rejects.toThrow();

    expect(fake.requests).toEqual([
      'POST /containers/create',
      'POST /containers/c1/attach',
      'DELETE /containers/c1',
    ]);
  });

  describe('ensureImage', () => {
    it('does not pull an image that is already present', async () => {
      const fake = await start({
        'GET /images/golang:1.22/json': (_req, res) => reply(res, 200, { Id: 'sha256:1' }),
      });

      await new ContainerManager(socketPath).ensureImage('golang:1.22');

      expect(fake.requests).toEqual(['GET /images/golang:1.22/json']);
    });

    it('pulls a missing image', async () => {
      const fake = await start({
        'POST /images/create': (_req, res) => {
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end('{"status":"Pulling from library/golang"}\n{"status":"Done"}\n');
        },
      });

      await new ContainerManager(socketPath).ensureImage('golang:1.22');

      expect(fake.requests).toEqual([
        'GET /images/golang:1.22/json',
        'POST /images/create',
      ]);
    });

    it('propagates errors other than a missing image', async () => {
      await start({
        'GET /images/golang:1.22/json': (_req, res) =>
          reply(res, 500, { message: 'daemon unavailable' }),
      });

      await expect(
        new ContainerManager(socketPath).ensureImage('golang:1.22'),
      ).rejects.toThrow(/daemon unavailable/);
    });
  });
});
