export * from './frame-codec.js'
export * from './pcm.js'
export * from './vad.js'
export * from './input-device.js'
export * from './audio-capture.js'
export * from './send-buffer.js'
export * from './transport.js'
export * from './streaming-session.js'
