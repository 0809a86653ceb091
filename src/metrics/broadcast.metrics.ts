import { getOrCreateCounter, getOrCreateGauge } from './registry';

export const broadcastPublishedTotal = getOrCreateCounter(
  'qa_broadcast_published_total',
  'Messages published to the broadcast hub',
  ['type']
);

export const broadcastDeliveriesTotal = getOrCreateCounter(
  'qa_broadcast_deliveries_total',
  'Per-connection deliveries by result',
  ['result']
);

export const broadcastSubscriptionsGauge = getOrCreateGauge(
  'qa_broadcast_subscriptions',
  'Current hub subscriptions'
);

export const wsConnectionsTotal = getOrCreateCounter(
  'qa_ws_connections_total',
  'WebSocket connections',
  ['namespace']
);

export const wsDisconnectsTotal = getOrCreateCounter(
  'qa_ws_disconnects_total',
  'WebSocket disconnects',
  ['namespace', 'reason']
);
