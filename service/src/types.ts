export type Device = {
  id: string
  name: string
  supportsTwoWayAudio: boolean
}

export type MotionSignal = {
  deviceId: string
  eventId: string
  observedAt: number
}

/**
 * Per-device access to the remote peer's session endpoints. Supplied by the
 * device registry.
 */
export type DeviceNegotiator = {
  negotiate: (offerSdp: string) => Promise<string>
  teardown: (sessionId: string) => Promise<void>
}

export type MonitoredDevice = {
  device: Device
  negotiator: DeviceNegotiator
}

export type SessionDirection = 'pull-video' | 'push-audio'

export type SessionState =
  | 'negotiating'
  | 'connected'
  | 'succeeded'
  | 'timed_out'
  | 'failed'
  | 'closed'

export type CaptureSession = {
  deviceId: string
  sessionId: string
  direction: SessionDirection
  deadline: number
}

export type Frame = {
  image: Buffer
  capturedAt: number
}

export type CaptureFailureKind = 'no_response' | 'timeout' | 'negotiation_rejected'

export type PullFrameResult =
  | { ok: true; frame: Frame }
  | { ok: false; failure: CaptureFailureKind; message: string }

export type Confidence = 'high' | 'medium' | 'low'

export type ClassificationResult = {
  isSuspicious: boolean
  confidence: Confidence
  isDelivery: boolean
  description: string
  reason: string
}

export type NotificationKind = 'delivered' | 'thief'

export type PipelineOutcome =
  | 'gated'
  | 'capture_failed'
  | 'classification_failed'
  | 'suspicious'
  | 'delivery'
  | 'clear'
