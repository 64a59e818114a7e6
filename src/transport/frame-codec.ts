import { MalformedRequestError } from '../errors'

/**
 * Picks the JSON payload out of a multi-part message. A broker-facing socket sees
 * `[routing id, "", payload]`, a dealer sees `["", payload]` or just `[payload]`;
 * in every case the payload is the last non-empty frame.
 *
 * @throws MalformedRequestError when every frame is empty
 */
export function extractPayload(frames: readonly Uint8Array[]): Uint8Array {
  for (let i = frames.length - 1; i >= 0; i--) {
    const frame = frames[i]
    if (frame !== undefined && frame.byteLength > 0) {
      return frame
    }
  }
  throw new MalformedRequestError(`Message with ${frames.length} frame(s) carries no payload`)
}
