/**
 * Basic dictation example
 *
 * Press Enter to start recording and Enter again to stop. Recognized text is
 * printed instead of typed. Requires ffmpeg and VOLC_ASR_APP_KEY /
 * VOLC_ASR_ACCESS_KEY (or VOLC_ASR_URL pointing at examples/mock-asr-server.ts).
 */

import { createInterface } from 'node:readline'
import { DictationController } from '../src/index.js'
import type { HistoryEntry, HistoryPlugin, TextInjectionPlugin } from '../src/index.js'

// Example injection plugin: print instead of typing into the focused window
const printInjector: TextInjectionPlugin = {
  name: 'print',
  async inject(text) {
    console.log(`\n>>> ${text}\n`)
  }
}

// Example history plugin: keep entries in memory
const history: HistoryEntry[] = []
const memoryHistory: HistoryPlugin = {
  name: 'memory',
  async append(entry) {
    history.push(entry)
  }
}

const controller = new DictationController({
  config: { verbose: true },
  plugins: { injector: printInjector, history: memoryHistory },
  hooks: {
    onStateChange: (state) => console.log(`[${state}]`),
    onPartialResult: (text) => console.log(`... ${text}`),
    onError: (error) => console.error(`Error: ${error.message}`),
    onAutoStop: (reason, result) => {
      if (reason === 'silence') {
        console.log('Recording cancelled (no speech detected)')
      } else if (result) {
        console.log(`Recording limit reached: "${result.text}"`)
      }
    }
  }
})

const rl = createInterface({ input: process.stdin, output: process.stdout })
console.log('Press Enter to start/stop recording, type "quit" to exit.')

rl.on('line', (input) => {
  if (input.trim() === 'quit') {
    rl.close()
    console.log(`${history.length} dictations this session`)
    process.exit(0)
  }

  const action = controller.getState() === 'idle'
    ? controller.startDictation()
    : controller.stopDictation().then((result) => {
      if (result && !result.text) {
        console.log('No text recognized')
      }
    })

  action.catch((error: unknown) => {
    console.error('Dictation failed:', error instanceof Error ? error.message : error)
  })
})
