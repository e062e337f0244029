/**
 * Snapshot of what the agent currently sees and hears. Produced by the
 * observation feed from an external capture source and frozen on creation.
 */
export interface Observation {
  id: string;
  timestampMs: number;
  /** Short natural-language description of the visible scene. */
  scene: string;
  /** Transcribed speech heard around the avatar, empty when silent. */
  heard: string;
}

/** Raw capture result before the feed stamps and latches it. */
export interface CapturedFrame {
  scene: string;
  heard: string;
}
