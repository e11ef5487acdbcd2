/**
 * DictationRunner - One interactive recording session in the terminal
 *
 * Starts a session, turns keypresses into session commands, draws a level
 * meter while recording and resolves with the session's result event.
 */

import { emitKeypressEvents } from 'readline';
import { commandForKeypress, formatKeyHelp } from '../shared/hotkeys';
import { SessionState, type AudioLevelEvent, type SessionResultEvent, type StateChangeEvent } from '../shared/types';
import type { SessionController } from '../main/SessionController';

// ============================================================================
// Types
// ============================================================================

export interface KeypressInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput extends NodeJS.WritableStream {
  isTTY?: boolean;
}

interface Keypress {
  name?: string;
  ctrl?: boolean;
}

export interface DictationOutcome {
  result: SessionResultEvent;
  /** Ctrl+C was pressed during the session */
  interrupted: boolean;
}

const METER_WIDTH = 24;

/**
 * Render a level in 0..1 as a fixed-width bar.
 */
export function renderLevelMeter(rms: number, width: number = METER_WIDTH): string {
  const clamped = Math.min(1, Math.max(0, rms));
  const filled = Math.round(clamped * width);
  return `${'█'.repeat(filled)}${'░'.repeat(width - filled)}`;
}

export function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

// ============================================================================
// DictationRunner
// ============================================================================

export class DictationRunner {
  private readonly controller: SessionController;
  private readonly input: KeypressInput;
  private readonly output: TerminalOutput;
  private interrupted = false;
  private meterVisible = false;

  constructor(controller: SessionController, input: KeypressInput, output: TerminalOutput) {
    this.controller = controller;
    this.input = input;
    this.output = output;
  }

  /**
   * Run until the session reaches a terminal state.
   */
  run(): Promise<DictationOutcome> {
    return new Promise((resolve) => {
      const onKeypress = (_chunk: unknown, key: Keypress | undefined) => this.handleKey(key);

      const unsubscribers = [
        this.controller.onLevel((event) => this.drawMeter(event)),
        this.controller.onStateChange((event) => this.describeState(event)),
        this.controller.onResult((result) => {
          for (const unsubscribe of unsubscribers) unsubscribe();
          this.input.removeListener('keypress', onKeypress);
          this.setRawMode(false);
          this.input.pause();
          this.clearMeter();
          resolve({ result, interrupted: this.interrupted });
        }),
      ];

      emitKeypressEvents(this.input);
      this.setRawMode(true);
      this.input.on('keypress', onKeypress);
      this.input.resume();

      this.controller.dispatch('start');
    });
  }

  private handleKey(key: Keypress | undefined): void {
    if (!key) return;
    const state = this.controller.getState();

    if (key.ctrl && key.name === 'c') {
      this.interrupted = true;
      if (state === SessionState.IDLE) return;
      this.controller.dispatch('cancel');
      return;
    }

    const command = commandForKeypress(key.name, state);
    if (command) {
      this.controller.dispatch(command);
    }
  }

  private describeState(event: StateChangeEvent): void {
    switch (event.state) {
      case SessionState.RECORDING:
        if (event.previousState === SessionState.IDLE) {
          this.line(`Recording from ${event.device?.name ?? 'default input'}`);
          this.line(formatKeyHelp());
        } else {
          this.line('Resumed');
        }
        break;
      case SessionState.PAUSED:
        this.line(`Paused at ${formatElapsed(event.elapsedMs)}`);
        break;
      case SessionState.TRANSCRIBING:
        this.line(`Transcribing ${formatElapsed(event.elapsedMs)} of audio...`);
        break;
      default:
        break;
    }
  }

  private drawMeter(event: AudioLevelEvent): void {
    if (!this.output.isTTY || this.controller.getState() !== SessionState.RECORDING) return;
    const elapsed = formatElapsed(this.controller.getElapsedMs());
    this.output.write(`\r  ${renderLevelMeter(event.rms)} ${elapsed}`);
    this.meterVisible = true;
  }

  private clearMeter(): void {
    if (this.meterVisible) {
      this.output.write('\r\x1b[K');
      this.meterVisible = false;
    }
  }

  private line(message: string): void {
    this.clearMeter();
    this.output.write(`  ${message}\n`);
  }

  private setRawMode(enabled: boolean): void {
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(enabled);
    }
  }
}
