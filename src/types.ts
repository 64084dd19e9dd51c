export type CameraProfile = {
  id: string;
  eventVideoPrefix: string;
  scale: number;
  skipFirstNSecs: number;
  maxLengthSecs: number;
};

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'subscribed';

export type ProcessingErrorPolicy = 'drop' | 'reconnect';

export type ProcessingStage = 'decode' | 'resolve' | 'fetch' | 'transcode' | 'publish';

export interface EventNotification {
  cameraId: string;
  eventId: string;
  receivedAt: number;
}

/** Raw inbound message as delivered by the broker, before decoding. */
export interface InboundMessage {
  topic: string;
  payload: Buffer;
  receivedAt: number;
}

export type DisconnectInfo = {
  requested: boolean;
  reason?: string;
};

export type BridgeEvent =
  | { type: 'connected' }
  | { type: 'disconnected'; info: DisconnectInfo }
  | { type: 'notification'; message: InboundMessage }
  | { type: 'subscribe-ack'; topic: string }
  | { type: 'publish-ack'; topic: string }
  | { type: 'broker-error'; error: Error };

export type BridgeEventType = BridgeEvent['type'];

export type ProcessResult =
  | { status: 'published'; cameraId: string; eventId: string; artifact: string }
  | { status: 'transcode-failed'; cameraId: string; eventId: string; exitCode: number };
