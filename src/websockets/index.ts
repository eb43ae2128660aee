import WebSocket from 'ws';
import { Server } from 'http';
import { handleFusedPosition, handleGnssState } from './handlers/gnss';
import { WebSocketMessage } from './types';

const handleMessage = (ws: WebSocket, message: WebSocket.RawData) => {
  const messageString = message.toString();

  let parsedMessage: unknown;
  try {
    parsedMessage = JSON.parse(messageString);
  } catch (error) {
    console.error('Failed to parse message:', error);
    return;
  }

  const type =
    parsedMessage && typeof parsedMessage === 'object' && 'type' in parsedMessage
      ? parsedMessage.type
      : undefined;

  switch (type) {
    case 'getGnssState':
      handleGnssState(ws);
      break;
    case 'getFusedPosition':
      handleFusedPosition(ws);
      break;
    default:
      console.log('Unknown message type:', type);
  }
};

const handleConnection = (ws: WebSocket) => {
  console.log('Client connected');

  // Send the current receiver state as soon as they connect
  handleGnssState(ws);

  ws.on('message', (message: WebSocket.RawData) => {
    handleMessage(ws, message);
  });
  ws.on('close', () => console.log('Client disconnected'));
};

let wss: WebSocket.Server | null = null;

export const createWebSocketServer = (server: Server): WebSocket.Server => {
  wss = new WebSocket.Server({ server });
  wss.on('connection', handleConnection);
  console.log('WebSocket created');
  return wss;
};

export const broadcast = (message: WebSocketMessage) => {
  if (!wss) {
    return;
  }
  const payload = JSON.stringify(message);
  wss.clients.forEach(client => {
    if (client.readyState === WebSocket.OPEN) {
      client.send(payload);
    }
  });
};

export const closeWebSocketServer = (): Promise<void> => {
  return new Promise((resolve, reject) => {
    if (!wss) {
      resolve();
      return;
    }

    console.log('Closing WebSocket server...');
    wss.close(err => {
      if (err) {
        console.error('Error closing WebSocket server:', err);
        reject(err);
      } else {
        console.log('WebSocket server closed successfully');
        wss = null;
        resolve();
      }
    });
  });
};
