import express from 'express';
import expressWs from 'express-ws';
import cors from 'cors';
import { WebSocket } from 'ws';
import { VoiceAdapter } from './channels/voice/adapter';
import { logger } from './utils/logger';

const FALLBACK_TWIML =
  "<?xml version=\"1.0\" encoding=\"UTF-8\"?><Response><Say>I'm sorry, but I'm experiencing technical difficulties. Please try again later.</Say></Response>";

/**
 * HTTP and WebSocket surface of the voice agent:
 * - `GET|POST /voice`: Twilio voice webhook, answers with ConversationRelay TwiML
 * - `POST /voice/handoff`: relay end-of-session callback
 * - `WS /conversation-relay`: the relay's text stream
 * - `GET /health`: liveness
 */
export const createServer = (voiceAdapter: VoiceAdapter) => {
  const { app } = expressWs(express());

  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  const voiceWebhook = (req: express.Request, res: express.Response) => {
    try {
      voiceAdapter.processVoiceWebhook(req, res);
    } catch (error) {
      logger.error('Voice webhook processing failed', error as Error, {
        operation: 'voice_webhook_error',
        adapterName: 'voice'
      });
      res.type('text/xml');
      res.send(FALLBACK_TWIML);
    }
  };
  app.get('/voice', voiceWebhook);
  app.post('/voice', voiceWebhook);

  app.post('/voice/handoff', (req, res) => {
    try {
      voiceAdapter.processHandoff(req, res);
    } catch (error) {
      logger.error('Voice handoff processing failed', error as Error, {
        operation: 'voice_handoff_error',
        adapterName: 'voice'
      });
      res.type('text/xml');
      res.send(FALLBACK_TWIML);
    }
  });

  app.ws('/conversation-relay', (ws: WebSocket, req: express.Request) => {
    try {
      voiceAdapter.processConversationRelay(ws, req);
    } catch (error) {
      logger.error('Voice WebSocket connection processing failed', error as Error, {
        operation: 'voice_websocket_connection_error',
        adapterName: 'voice'
      });
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(1011, 'Internal server error');
      }
    }
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return app;
};
