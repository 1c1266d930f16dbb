import type { BroadcastMode } from "../config/types.js";
import type { EndingPhase } from "../perception/types.js";

const PHASE_ORDER: readonly EndingPhase[] = ["none", "wind_down", "ending_announce", "final_goodbye"];

export function phaseRank(phase: EndingPhase): number {
  return PHASE_ORDER.indexOf(phase);
}

export interface BroadcastStateInit {
  readonly mode: BroadcastMode;
  readonly gameName?: string;
}

/**
 * The one handle the assembler, loop and ending sequence share. Within a
 * session the ending phase only moves forward; `beginSession()` is the
 * only way back to `none`.
 */
export class BroadcastState {
  private _mode: BroadcastMode;
  private _gameName: string;
  private _startedAt: Date | null = null;
  private _endingPhase: EndingPhase = "none";

  constructor(init: BroadcastStateInit) {
    this._mode = init.mode;
    this._gameName = init.mode === "game" ? (init.gameName ?? "") : "";
  }

  get mode(): BroadcastMode {
    return this._mode;
  }

  get gameName(): string {
    return this._gameName;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get endingPhase(): EndingPhase {
    return this._endingPhase;
  }

  setMode(mode: BroadcastMode, gameName = ""): void {
    this._mode = mode;
    this._gameName = mode === "game" ? gameName : "";
  }

  beginSession(at: Date): void {
    this._startedAt = at;
    this._endingPhase = "none";
  }

  /** Moves the ending phase forward. Returns false (and changes nothing) for a step backwards or sideways. */
  advanceEnding(phase: EndingPhase): boolean {
    if (phaseRank(phase) <= phaseRank(this._endingPhase)) return false;
    this._endingPhase = phase;
    return true;
  }
}
