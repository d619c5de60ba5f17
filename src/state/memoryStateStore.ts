import type { EngagementEntry, KillSwitchState, StateSnapshot } from '../domain/types.js';
import { applyCommit, emptySnapshot, type ErrorLogEntry, type PostCommit, type StateStore } from './stateStore.js';

/** In-process StateStore. Nothing survives the process. */
export class MemoryStateStore implements StateStore {
  private state: StateSnapshot;
  readonly engagement: EngagementEntry[] = [];
  readonly errors: ErrorLogEntry[] = [];
  /** Count of mutating calls, so callers can assert nothing was written. */
  writes = 0;

  constructor(initial?: Partial<StateSnapshot>) {
    this.state = { ...emptySnapshot(), ...initial };
  }

  async load(): Promise<StateSnapshot> {
    return structuredClone(this.state);
  }

  async getKillSwitch(): Promise<KillSwitchState> {
    return this.state.killSwitch;
  }

  async setKillSwitch(state: KillSwitchState): Promise<void> {
    this.writes++;
    this.state = { ...this.state, killSwitch: state };
  }

  async commitPost(commit: PostCommit): Promise<void> {
    this.writes++;
    this.state = applyCommit(this.state, commit);
  }

  async appendEngagement(entry: EngagementEntry): Promise<void> {
    this.writes++;
    this.engagement.push(entry);
  }

  async appendError(entry: ErrorLogEntry): Promise<void> {
    this.writes++;
    this.errors.push(entry);
  }
}
