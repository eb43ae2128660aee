import { gnss } from '../../util/gnss';
import { toStateView } from '../../util/gnss/serialize';
import { WebSocketHandler, WebSocketMessage } from '../types';
import WebSocket from 'ws';

export const handleGnssState: WebSocketHandler = (ws: WebSocket) => {
  const message: WebSocketMessage = {
    type: 'gnssState',
    data: toStateView(gnss),
  };
  ws.send(JSON.stringify(message));
};

export const handleFusedPosition: WebSocketHandler = (ws: WebSocket) => {
  const message: WebSocketMessage = {
    type: 'fusedPosition',
    data: gnss.getFusedPosition() ?? null,
  };
  ws.send(JSON.stringify(message));
};
