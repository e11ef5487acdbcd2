/**
 * Hotkey semantics for scribekey
 *
 * Turns raw key events (a global hotkey's press/release, or a terminal
 * keypress in the CLI) into abstract SessionCommands. The OS-level hook
 * itself lives outside the core; whatever owns it feeds events here and
 * forwards the resulting commands with `dispatch`, which never blocks.
 */

import { SessionState, isTerminalState, type SessionCommand } from './types';

// ============================================================================
// Types
// ============================================================================

/** toggle: press starts and the next press stops. hold: record while held. */
export type RecordMode = 'toggle' | 'hold';

export const RECORD_MODES: readonly RecordMode[] = ['toggle', 'hold'];

export type HotkeyAction = 'press' | 'release';

export interface CommandSink {
  dispatch(command: SessionCommand): void;
  getState(): SessionState;
}

export interface KeyBinding {
  /** Key name as reported by Node's readline keypress events */
  key: string;
  label: string;
  description: string;
}

// ============================================================================
// Record Hotkey Translation
// ============================================================================

/**
 * Commands for one hotkey event given the current session state.
 * A finished session is acknowledged first so the press starts a new one.
 */
export function translateHotkey(
  mode: RecordMode,
  action: HotkeyAction,
  state: SessionState
): SessionCommand[] {
  if (action === 'press') {
    if (state === SessionState.IDLE) return ['start'];
    if (isTerminalState(state)) return ['acknowledge', 'start'];
    if (mode === 'toggle' && (state === SessionState.RECORDING || state === SessionState.PAUSED)) {
      return ['stop'];
    }
    return [];
  }

  if (mode === 'hold' && (state === SessionState.RECORDING || state === SessionState.PAUSED)) {
    return ['stop'];
  }
  return [];
}

export class HotkeyCommandTranslator {
  private mode: RecordMode;
  private readonly sink: CommandSink;

  constructor(sink: CommandSink, mode: RecordMode = 'toggle') {
    this.sink = sink;
    this.mode = mode;
  }

  setMode(mode: RecordMode): void {
    this.mode = mode;
  }

  getMode(): RecordMode {
    return this.mode;
  }

  press(): SessionCommand[] {
    return this.forward('press');
  }

  release(): SessionCommand[] {
    return this.forward('release');
  }

  private forward(action: HotkeyAction): SessionCommand[] {
    const commands = translateHotkey(this.mode, action, this.sink.getState());
    for (const command of commands) {
      this.sink.dispatch(command);
    }
    return commands;
  }
}

// ============================================================================
// Terminal Key Bindings
// ============================================================================

export const KEY_BINDINGS = {
  stop: { key: 'return', label: 'Enter', description: 'stop and transcribe' },
  pauseResume: { key: 'p', label: 'P', description: 'pause / resume' },
  cancel: { key: 'c', label: 'C', description: 'cancel' },
  cancelAlt: { key: 'escape', label: 'Esc', description: 'cancel' },
} as const satisfies Record<string, KeyBinding>;

/**
 * Map a terminal keypress to a command, or null when the key does nothing
 * in the current state.
 */
export function commandForKeypress(keyName: string | undefined, state: SessionState): SessionCommand | null {
  if (!keyName) return null;
  const key = keyName.toLowerCase();
  const active = state === SessionState.RECORDING || state === SessionState.PAUSED;

  if (key === KEY_BINDINGS.stop.key || key === 'enter') {
    return active ? 'stop' : null;
  }
  if (key === KEY_BINDINGS.pauseResume.key) {
    if (state === SessionState.RECORDING) return 'pause';
    if (state === SessionState.PAUSED) return 'resume';
    return null;
  }
  if (key === KEY_BINDINGS.cancel.key || key === KEY_BINDINGS.cancelAlt.key) {
    return active || state === SessionState.TRANSCRIBING ? 'cancel' : null;
  }
  return null;
}

/**
 * One-line help text for the recording prompt.
 */
export function formatKeyHelp(): string {
  return [KEY_BINDINGS.stop, KEY_BINDINGS.pauseResume, KEY_BINDINGS.cancel]
    .map((binding) => `[${binding.label}] ${binding.description}`)
    .join('  ');
}
