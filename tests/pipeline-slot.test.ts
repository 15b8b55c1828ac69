import { describe, expect, it } from 'vitest';
import type { PipelineState } from '@shared/contracts';
import { PipelineSlot } from '@main/services/updater/PipelineSlot';

describe('PipelineSlot', () => {
  it('permite um único dono por vez', () => {
    const slot = new PipelineSlot();

    const first = slot.tryAcquire('refreshing-cache');
    expect(first).not.toBeNull();
    expect(slot.isIdle()).toBe(false);
    expect(slot.tryAcquire('installing')).toBeNull();

    first?.release();
    expect(slot.isIdle()).toBe(true);
    expect(slot.tryAcquire('installing')).not.toBeNull();
    expect(slot.state).toBe('installing');
  });

  it('ignora avanços e liberações de um lease antigo', () => {
    const states: PipelineState[] = [];
    const slot = new PipelineSlot((state) => states.push(state));

    const stale = slot.tryAcquire('refreshing-cache');
    stale?.release();
    const current = slot.tryAcquire('installing');

    stale?.advance('comparing-versions');
    stale?.release();

    expect(stale?.isActive()).toBe(false);
    expect(current?.isActive()).toBe(true);
    expect(slot.state).toBe('installing');
    expect(states).toEqual(['refreshing-cache', 'idle', 'installing']);
  });

  it('notifica apenas mudanças reais de estado', () => {
    const states: PipelineState[] = [];
    const slot = new PipelineSlot((state) => states.push(state));

    const lease = slot.tryAcquire('refreshing-cache');
    lease?.advance('refreshing-cache');
    lease?.advance('comparing-versions');
    lease?.release();
    lease?.release();

    expect(states).toEqual(['refreshing-cache', 'comparing-versions', 'idle']);
  });

  it('desfaz a aquisição quando o listener lança na entrada', () => {
    let calls = 0;
    const slot = new PipelineSlot(() => {
      calls += 1;
      if (calls === 1) {
        throw new Error('falha no listener');
      }
    });

    expect(() => slot.tryAcquire('installing')).toThrow('falha no listener');
    expect(slot.isIdle()).toBe(true);
    expect(slot.state).toBe('idle');
    expect(slot.tryAcquire('refreshing-cache')).not.toBeNull();
  });
});
