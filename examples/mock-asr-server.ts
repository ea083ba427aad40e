/**
 * Mock ASR server speaking the binary framing protocol.
 * Replies to the opening request, acknowledges audio, emits a partial result
 * every few frames and a final result after the terminal frame.
 *
 * Usage: tsx examples/mock-asr-server.ts
 * Then point VOLC_ASR_URL at ws://localhost:3100/asr
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws'
import {
  decodeRequest,
  encodeAck,
  encodeErrorResponse,
  encodeResponse,
  calculateDuration,
  type WireMessage
} from '../src/index.js'

const PORT = 3100
const PARTIAL_EVERY = 5

interface ConnectionInfo {
  requestId: string
  audioBytes: number
  frames: number
  isAlive: boolean
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data
  if (Array.isArray(data)) return Buffer.concat(data)
  return Buffer.from(data)
}

function transcriptFor(info: ConnectionInfo): string {
  const seconds = calculateDuration(info.audioBytes, 16000, 1, 16)
  return `received ${seconds.toFixed(1)} seconds of audio`
}

const wss = new WebSocketServer({ port: PORT, path: '/asr', perMessageDeflate: false })
const connections = new Map<WebSocket, ConnectionInfo>()

console.log(`Mock ASR server listening on ws://localhost:${PORT}/asr`)

// Heartbeat to detect dead connections
const heartbeat = setInterval(() => {
  for (const [ws, info] of connections) {
    if (!info.isAlive) {
      console.log(`Terminating dead connection: ${info.requestId}`)
      ws.terminate()
      connections.delete(ws)
      continue
    }
    info.isAlive = false
    ws.ping()
  }
}, 15000)

wss.on('connection', (ws, request) => {
  const header = request.headers['x-api-request-id']
  const requestId = typeof header === 'string' ? header : `request_${Date.now()}`
  const info: ConnectionInfo = { requestId, audioBytes: 0, frames: 0, isAlive: true }
  connections.set(ws, info)

  console.log(`Connection established: ${requestId}`)

  ws.on('pong', () => {
    info.isAlive = true
  })

  ws.on('message', (data: RawData) => {
    let message: WireMessage
    try {
      message = decodeRequest(toBuffer(data))
    } catch (error) {
      console.error('Bad client frame:', error instanceof Error ? error.message : error)
      ws.send(encodeErrorResponse(45000001, { message: 'invalid frame' }))
      return
    }

    if (message.type === 'full_request') {
      console.log('Opening request:', JSON.stringify(message.payload))
      ws.send(encodeResponse({ result: { text: '' } }, 1))
      return
    }

    if (message.type !== 'audio_only') {
      return
    }

    info.frames++
    info.audioBytes += message.audio.length
    const seq = Math.abs(message.sequence ?? 0)

    if (message.terminal) {
      console.log(`Terminal frame from ${requestId}: ${info.frames} frames, ${info.audioBytes} bytes`)
      ws.send(encodeResponse({ result: { text: transcriptFor(info) } }, seq, true))
      return
    }

    ws.send(encodeAck(seq))
    if (info.frames % PARTIAL_EVERY === 0) {
      ws.send(encodeResponse({ result: [{ text: 'received ' }, { text: `${info.frames} frames` }] }, seq))
    }
  })

  ws.on('error', (error) => {
    console.error(`WebSocket error for ${requestId}:`, error)
  })

  ws.on('close', () => {
    console.log(`Connection closed: ${requestId}`)
    connections.delete(ws)
  })
})

process.on('SIGINT', () => {
  clearInterval(heartbeat)
  for (const [ws] of connections) {
    ws.close()
  }
  wss.close(() => {
    console.log('Mock ASR server closed')
    process.exit(0)
  })
})
