import { describe, expect, it } from 'vitest'
import { readSessionOrigin } from './sdp'

const offer = [
  'v=0',
  'o=- 4611731400430051336 2 IN IP4 127.0.0.1',
  's=-',
  't=0 0',
  'm=video 9 UDP/TLS/RTP/SAVPF 96',
].join('\r\n')

describe('readSessionOrigin', () => {
  it('reads every origin field from a CRLF description', () => {
    expect(readSessionOrigin(offer)).toEqual({
      username: '-',
      sessionId: '4611731400430051336',
      sessionVersion: '2',
      netType: 'IN',
      addrType: 'IP4',
      unicastAddress: '127.0.0.1',
    })
  })

  it('accepts LF line endings', () => {
    expect(readSessionOrigin('v=0\no=alice 42 1 IN IP6 ::1\ns=-')?.sessionId).toBe('42')
  })

  it('returns null without an origin line', () => {
    expect(readSessionOrigin('v=0\r\ns=-')).toBeNull()
  })

  it('returns null for a truncated origin line', () => {
    expect(readSessionOrigin('v=0\r\no=- 42\r\n')).toBeNull()
  })
})
