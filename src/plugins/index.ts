/**
 * Text injection plugin interface
 * Delivers the settled transcript to the focused application
 */
export interface TextInjectionPlugin {
  /**
   * Plugin name for identification
   */
  name: string

  /**
   * Insert text at the current cursor position
   * @param text Settled transcript (never empty)
   */
  inject(text: string): Promise<void>
}

/**
 * One dictation as recorded in history
 */
export interface HistoryEntry {
  /** Recognizer output before post-processing */
  original: string
  /** Text that was injected */
  text: string
  /** Whether post-processing changed the text */
  corrected: boolean
  /** Length of captured audio in milliseconds */
  audioDurationMs: number
  /** Unix timestamp in milliseconds */
  timestamp: number
}

/**
 * History plugin interface
 * Append-only sink for settled transcripts
 */
export interface HistoryPlugin {
  /**
   * Plugin name for identification
   */
  name: string

  /**
   * Record a completed dictation
   * @param entry Settled dictation
   */
  append(entry: HistoryEntry): Promise<void>
}

/**
 * Post-processing plugin interface
 * Opaque text correction (for example, an LLM pass) applied before injection
 */
export interface PostProcessPlugin {
  /**
   * Plugin name for identification
   */
  name: string

  /**
   * Transform recognized text
   * @param text Recognizer output
   * @returns Corrected text; failures fall back to the input
   */
  process(text: string): Promise<string>
}

/**
 * Downstream collaborators of the dictation controller
 */
export interface DictationPlugins {
  /** Text injection (required) */
  injector: TextInjectionPlugin
  /** History sink */
  history?: HistoryPlugin
  /** Post-processing applied before injection */
  postProcess?: PostProcessPlugin
}
