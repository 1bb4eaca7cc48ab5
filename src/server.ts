import express from 'express';
import http from 'node:http';

import { WebSocket, WebSocketServer } from 'ws';

import type { Logger } from './logger';
import type StreamTranscription from './transcription';
import type { TranscriptionEvents } from './transcription';

const BROADCAST_EVENTS = ['sessionStarted', 'state', 'record', 'sessionEnded'] as const satisfies readonly (keyof TranscriptionEvents)[];

export type LiveFeed = {
  server: http.Server
  /// Resolves with the bound port once listening.
  listening: Promise<number>
  close(): Promise<void>
}

/**
 * Publishes a running session over HTTP: a snapshot at `GET /api/session`
 * and every session event over the WebSocket at `/api/ws`.
 */
function serve(transcription: StreamTranscription, port: number, logger: Logger, host?: string): LiveFeed {
  const app = express();
  const wss = new WebSocketServer({ noServer: true });
  const server = http.createServer(app);

  wss.on('connection', (ws) => {
    ws.on('error', (err) => logger.warn('websocket client error:', err));
  });

  function broadcastMessage(message: string) {
    for (const client of wss.clients) {
      if (client.readyState !== WebSocket.OPEN) { continue; }
      client.send(message);
    }
  }

  app.get('/api/session', (_req, res) => {
    res.setHeader('Cache-Control', 'no-store');
    res.json({
      sessionId: transcription.sessionId,
      state: transcription.state,
      records: transcription.transcript,
    });
  });

  server.on('upgrade', (req, socket, head) => {
    const { pathname } = new URL(req.url || '/', 'http://localhost');
    if (pathname === '/api/ws' || pathname === '/ws') {
      wss.handleUpgrade(req, socket, head, (ws) => {
        wss.emit('connection', ws, req);
      });
    } else {
      socket.destroy();
    }
  });

  for (const event of BROADCAST_EVENTS) {
    transcription.on(event, (data) => {
      broadcastMessage(JSON.stringify({
        type: event,
        data,
      }));
    });
  }

  const listening = new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      server.on('error', (err) => logger.warn('live feed server error:', err));
      const address = server.address();
      const bound = typeof address === 'object' && address !== null ? address.port : port;
      logger.info(`Listening on port ${bound}`);
      resolve(bound);
    });
  });

  const close = () => new Promise<void>((resolve, reject) => {
    for (const client of wss.clients) {
      client.terminate();
    }
    wss.close();
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });

  return { server, listening, close };
}

export default serve;
