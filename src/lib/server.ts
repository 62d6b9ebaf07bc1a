/**
 * HTTP surface of the relay.
 *
 *   POST /events        JSON {image_path, caption, ...}  -> 202 (200 with ?wait=1)
 *   POST /from_vila     text/plain caption, paired with the newest captured frame
 *   GET  /events/:id    record summary
 *   GET  /latest        recent record summaries
 *   GET  /health        liveness; never touches downstream services
 */
import http from 'http';
import { findLatestImage } from './captures';
import type { PipelineCoordinator } from './coordinator';
import { formatError } from './errors';
import { createCaptureEvent, EventRejectedError, InboundEventSchema } from './events';
import { createLogger, type Logger } from './log';
import { summarizeRecord } from './record';
import type { CaptureEvent } from './types';

export const MAX_BODY_BYTES = 1024 * 1024;

export type RelayServerOptions = {
  coordinator: PipelineCoordinator;
  capturesRoot: string;
  logger?: Logger;
  maxBodyBytes?: number;
};

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

async function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) throw new EventRejectedError(413, `request body exceeds ${limit} bytes`);
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new EventRejectedError(400, 'body is not valid JSON');
  }
}

function decodeEventId(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new EventRejectedError(400, 'malformed event id');
  }
}

export function createRelayServer(options: RelayServerOptions): http.Server {
  const { coordinator, capturesRoot } = options;
  const logger = options.logger ?? createLogger('http');
  const maxBodyBytes = options.maxBodyBytes ?? MAX_BODY_BYTES;

  async function dispatch(event: CaptureEvent, wait: boolean, res: http.ServerResponse) {
    logger.info('event accepted', { event: event.id, image: event.imagePath });
    const done = coordinator.submit(event);
    if (wait) {
      const record = await done;
      sendJson(res, 200, { ok: true, record: summarizeRecord(record) });
      return;
    }
    done.catch((error: unknown) => logger.error('event crashed', { event: event.id, error: formatError(error) }));
    sendJson(res, 202, { ok: true, event_id: event.id, status_url: `/events/${encodeURIComponent(event.id)}` });
  }

  async function handle(req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? '/', 'http://relay.local');
    const method = req.method ?? 'GET';
    const wait = url.searchParams.get('wait') === '1';

    if (method === 'GET' && url.pathname === '/health') {
      const stats = coordinator.getStats();
      sendJson(res, 200, { ok: true, time: Math.floor(Date.now() / 1000), in_flight: stats.inFlight, queued: stats.queued });
      return;
    }

    if (method === 'GET' && url.pathname === '/latest') {
      const limit = Math.min(200, Math.max(1, Number(url.searchParams.get('limit')) || 20));
      sendJson(res, 200, { ok: true, records: coordinator.latest(limit).map(summarizeRecord) });
      return;
    }

    const statusMatch = /^\/events\/([^/]+)$/.exec(url.pathname);
    if (method === 'GET' && statusMatch) {
      const record = coordinator.get(decodeEventId(statusMatch[1]));
      if (!record) {
        sendJson(res, 404, { ok: false, error: 'unknown event' });
        return;
      }
      sendJson(res, 200, { ok: true, record: summarizeRecord(record) });
      return;
    }

    if (method === 'POST' && url.pathname === '/events') {
      const parsed = InboundEventSchema.safeParse(parseJson(await readBody(req, maxBodyBytes)));
      if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
        throw new EventRejectedError(400, detail);
      }
      const event = await createCaptureEvent(capturesRoot, parsed.data);
      await dispatch(event, wait, res);
      return;
    }

    if (method === 'POST' && url.pathname === '/from_vila') {
      const caption = (await readBody(req, maxBodyBytes)).trim();
      if (!caption) throw new EventRejectedError(400, 'empty caption');
      const latest = await findLatestImage(capturesRoot);
      if (!latest) throw new EventRejectedError(404, `no image found under ${capturesRoot}`);
      const event = await createCaptureEvent(capturesRoot, { image_path: latest, caption });
      await dispatch(event, wait, res);
      return;
    }

    sendJson(res, 404, { ok: false, error: `no route for ${method} ${url.pathname}` });
  }

  return http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      if (error instanceof EventRejectedError) {
        logger.warn('rejected', { status: error.status, error: error.message });
        if (!res.headersSent) sendJson(res, error.status, { ok: false, error: error.message });
        return;
      }
      logger.error('request failed', { error: formatError(error) });
      if (!res.headersSent) sendJson(res, 500, { ok: false, error: 'internal error' });
      else res.end();
    });
  });
}

/** Resolve once the server is listening; returns the bound port. */
export function listen(server: http.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : port);
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
