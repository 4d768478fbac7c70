export type SessionOrigin = {
  username: string
  sessionId: string
  sessionVersion: string
  netType: string
  addrType: string
  unicastAddress: string
}

/**
 * Reads the `o=` line of a session description (RFC 8866 §5.2). The origin's
 * session id identifies the live session when it is torn down.
 */
export const readSessionOrigin = (sdp: string): SessionOrigin | null => {
  const line = sdp
    .split(/\r?\n/)
    .find((candidate) => candidate.startsWith('o='))
  if (!line) return null

  const fields = line.slice(2).trim().split(/\s+/)
  if (fields.length < 6) return null

  const [username, sessionId, sessionVersion, netType, addrType, unicastAddress] = fields
  return { username, sessionId, sessionVersion, netType, addrType, unicastAddress }
}
