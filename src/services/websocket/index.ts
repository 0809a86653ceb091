export {
  NamespacedWebSocketService,
  initializeNamespacedWebSocket,
  getNamespacedWebSocketService,
  closeNamespacedWebSocket,
} from './namespaced-websocket.service';
export type { MeetingsSocketServer } from './namespaced-websocket.service';
export { MeetingsNamespaceService, MEETINGS_NAMESPACE } from './meetings-namespace.service';
export { NamespaceBaseService } from './namespace-base.service';
export type { NamespaceSocket, TypedNamespace } from './namespace-base.service';
