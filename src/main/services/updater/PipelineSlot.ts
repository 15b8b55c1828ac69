import type { PipelineState } from '@shared/contracts';

type ActiveState = Exclude<PipelineState, 'idle' | 'awaiting-network'>;

export interface PipelineLease {
  isActive(): boolean;
  advance(state: ActiveState): void;
  release(): void;
}

/**
 * Single in-flight token shared by the check and install pipelines.
 * `tryAcquire` is synchronous, so callers that take it before their first
 * `await` get an atomic check-and-set on the control thread.
 */
export class PipelineSlot {
  private current: PipelineState = 'idle';
  private owner: object | null = null;

  constructor(private readonly onChange?: (state: PipelineState) => void) {}

  get state(): PipelineState {
    return this.current;
  }

  isIdle(): boolean {
    return this.owner === null;
  }

  tryAcquire(initial: ActiveState): PipelineLease | null {
    if (this.owner !== null) {
      return null;
    }

    const token = {};
    this.owner = token;
    try {
      this.set(initial);
    } catch (error) {
      // listener falhou antes do lease existir: desfaz a aquisição
      this.owner = null;
      this.current = 'idle';
      throw error;
    }

    return {
      isActive: () => this.owner === token,
      advance: (state) => {
        if (this.owner === token) {
          this.set(state);
        }
      },
      release: () => {
        if (this.owner === token) {
          this.owner = null;
          this.set('idle');
        }
      }
    };
  }

  private set(state: PipelineState): void {
    if (this.current === state) {
      return;
    }
    this.current = state;
    this.onChange?.(state);
  }
}
