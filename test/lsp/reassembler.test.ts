/**
 * Reassembler tests.
 *
 * The property tests feed encoded messages split at arbitrary byte offsets,
 * which covers boundaries inside the header, on the delimiter, inside
 * multi-byte UTF-8 sequences and between messages.
 */
import * as fc from 'fast-check'
import { beforeEach, describe, expect, it } from 'vitest'
import { encodeMessage, splitDatagrams } from '../../src/lsp/framing.js'
import { Reassembler } from '../../src/lsp/reassembler.js'
import { captureLogger, type LogCapture } from '../_harness/index.js'

/** Split bytes at the given offsets (taken modulo the length). */
function splitAt(data: Buffer, cuts: number[]): Buffer[] {
  if (data.length === 0) return [data]
  const offsets = [...new Set(cuts.map((c) => c % data.length))].filter((c) => c > 0).sort((a, b) => a - b)
  const parts: Buffer[] = []
  let start = 0
  for (const offset of offsets) {
    parts.push(data.subarray(start, offset))
    start = offset
  }
  parts.push(data.subarray(start))
  return parts
}

function text(messages: Buffer[]): string[] {
  return messages.map((m) => m.toString('utf-8'))
}

const INITIALIZE = '{"jsonrpc":"2.0","id":1,"method":"initialize","params":{"processId":null}}'
const COMPLETION =
  '{"jsonrpc":"2.0","id":2,"method":"textDocument/completion","params":{"textDocument":{"uri":"file:///tmp/a.scd"},"position":{"line":3,"character":7}}}'

describe('Reassembler', () => {
  let reassembler: Reassembler
  let capture: LogCapture

  beforeEach(() => {
    const captured = captureLogger('receiver')
    capture = captured.capture
    reassembler = new Reassembler(captured.logger)
  })

  it('emits a message contained in one datagram', () => {
    const messages = reassembler.push(encodeMessage(INITIALIZE))

    expect(text(messages)).toEqual([`Content-Length: ${INITIALIZE.length}\r\n\r\n${INITIALIZE}`])
    expect(reassembler.pendingBytes).toBe(0)
    expect(reassembler.declaredLength).toBeNull()
  })

  it('waits for the rest of a header split across datagrams', () => {
    expect(reassembler.push(Buffer.from('Content-Len'))).toEqual([])
    expect(reassembler.push(Buffer.from('gth: 2\r\n'))).toEqual([])
    expect(reassembler.declaredLength).toBeNull()

    const messages = reassembler.push(Buffer.from('\r\nok'))

    expect(text(messages)).toEqual(['Content-Length: 2\r\n\r\nok'])
  })

  it('keeps the declared length while the body is incomplete', () => {
    expect(reassembler.push(Buffer.from('Content-Length: 10\r\n\r\n0123'))).toEqual([])
    expect(reassembler.declaredLength).toBe(10)
    expect(reassembler.pendingBytes).toBe(4)

    expect(reassembler.push(Buffer.from('456'))).toEqual([])
    expect(reassembler.declaredLength).toBe(10)

    const messages = reassembler.push(Buffer.from('789'))

    expect(text(messages)).toEqual(['Content-Length: 10\r\n\r\n0123456789'])
    expect(reassembler.declaredLength).toBeNull()
  })

  it('reassembles the datagrams the sender produces for a long message', () => {
    const body = JSON.stringify({ jsonrpc: '2.0', id: 3, result: { items: 'x'.repeat(1200) } })
    const frame = encodeMessage(body)
    const datagrams = [...splitDatagrams(frame)]
    expect(datagrams.length).toBe(Math.ceil(frame.length / 508))

    const messages = datagrams.flatMap((d) => reassembler.push(d))

    expect(messages).toHaveLength(1)
    expect(messages[0]).toEqual(frame)
  })

  it('emits every message completed by one datagram, in order', () => {
    const datagram = Buffer.concat([encodeMessage(INITIALIZE), encodeMessage(COMPLETION)])

    const messages = reassembler.push(datagram)

    expect(text(messages)).toEqual([
      `Content-Length: ${INITIALIZE.length}\r\n\r\n${INITIALIZE}`,
      `Content-Length: ${COMPLETION.length}\r\n\r\n${COMPLETION}`
    ])
  })

  it('emits a completed message and keeps the start of the next', () => {
    const second = encodeMessage('{"id":9}')
    const datagram = Buffer.concat([encodeMessage('{"id":8}'), second.subarray(0, 5)])

    expect(text(reassembler.push(datagram))).toEqual(['Content-Length: 8\r\n\r\n{"id":8}'])
    expect(reassembler.pendingBytes).toBe(5)

    expect(text(reassembler.push(second.subarray(5)))).toEqual(['Content-Length: 8\r\n\r\n{"id":9}'])
  })

  it('emits a message with an empty body', () => {
    const messages = reassembler.push(Buffer.from('Content-Length: 0\r\n\r\n'))

    expect(text(messages)).toEqual(['Content-Length: 0\r\n\r\n'])
  })

  it('re-synthesizes the header from the verified byte length', () => {
    const datagram = Buffer.from(
      'Content-Type: application/vscode-jsonrpc; charset=utf-8\r\nContent-Length: 4\r\n\r\n"é"',
      'utf-8'
    )

    const messages = reassembler.push(datagram)

    expect(text(messages)).toEqual(['Content-Length: 4\r\n\r\n"é"'])
  })

  it('keeps a leading byte order mark in the body', () => {
    const frame = encodeMessage('\uFEFF{}')

    expect(reassembler.push(frame)).toEqual([frame])
  })

  describe('malformed header', () => {
    it('logs an error and emits nothing', () => {
      const messages = reassembler.push(Buffer.from('Bogus: 1\r\n\r\n'))

      expect(messages).toEqual([])
      expect(capture.messages('error')).toEqual(['Invalid header received'])
    })

    it('recovers for well-formed data delivered afterwards', () => {
      reassembler.push(Buffer.from('Bogus: 1\r\n\r\n'))

      const messages = reassembler.push(encodeMessage('{"id":1}'))

      expect(text(messages)).toEqual(['Content-Length: 8\r\n\r\n{"id":1}'])
    })

    it('stops the pass and resumes with the next datagram', () => {
      const datagram = Buffer.concat([Buffer.from('Bogus: 1\r\n\r\n'), encodeMessage('{"id":1}')])

      expect(reassembler.push(datagram)).toEqual([])
      expect(reassembler.pendingBytes).toBe(encodeMessage('{"id":1}').length)

      const messages = reassembler.push(encodeMessage('{"id":2}'))

      expect(text(messages)).toEqual(['Content-Length: 8\r\n\r\n{"id":1}', 'Content-Length: 8\r\n\r\n{"id":2}'])
    })
  })

  describe('invalid UTF-8 body', () => {
    it('drops the message and keeps later messages intact', () => {
      const bad = Buffer.concat([Buffer.from('Content-Length: 2\r\n\r\n'), Buffer.from([0xff, 0xfe])])
      const datagram = Buffer.concat([bad, encodeMessage('{"id":1}')])

      const messages = reassembler.push(datagram)

      expect(text(messages)).toEqual(['Content-Length: 8\r\n\r\n{"id":1}'])
      expect(capture.messages('error')).toEqual(['Invalid UTF-8 body received (2 bytes), dropping message'])
      expect(reassembler.pendingBytes).toBe(0)
      expect(reassembler.declaredLength).toBeNull()
    })
  })

  describe('properties', () => {
    it('one message split anywhere is emitted once, byte-identical', () => {
      fc.assert(
        fc.property(fc.fullUnicodeString({ maxLength: 1500 }), fc.array(fc.nat(), { maxLength: 12 }), (body, cuts) => {
          const r = new Reassembler(captureLogger().logger)
          const frame = encodeMessage(body)

          const messages = splitAt(frame, cuts).flatMap((part) => r.push(part))

          expect(messages).toHaveLength(1)
          expect(messages[0]).toEqual(frame)
          expect(r.pendingBytes).toBe(0)
        })
      )
    })

    it('back-to-back messages split anywhere are emitted in order', () => {
      fc.assert(
        fc.property(
          fc.array(fc.fullUnicodeString({ maxLength: 400 }), { minLength: 1, maxLength: 5 }),
          fc.array(fc.nat(), { maxLength: 20 }),
          (bodies, cuts) => {
            const r = new Reassembler(captureLogger().logger)
            const frames = bodies.map((b) => encodeMessage(b))

            const messages = splitAt(Buffer.concat(frames), cuts).flatMap((part) => r.push(part))

            expect(messages).toEqual(frames)
          }
        )
      )
    })
  })
})
