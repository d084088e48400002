import { describe, it, expect, beforeEach } from 'vitest';
import { SpecialStateType } from '@statenav/contracts';
import { StateDetector } from '../state-detector.js';
import { ActiveStateMemory } from '../../memory/index.js';
import { InMemoryStateRegistry } from '../../registry/index.js';
import { FakeStateFinder, makeMockLogger } from '../../testing.js';

describe('StateDetector', () => {
  let registry: InMemoryStateRegistry;
  let memory: ActiveStateMemory;
  let finder: FakeStateFinder;
  let detector: StateDetector;

  beforeEach(() => {
    registry = new InMemoryStateRegistry();
    registry.register({ name: 'Login' });
    registry.register({ name: 'Dashboard' });
    registry.register({ name: 'Settings' });
    memory = new ActiveStateMemory(registry);
    finder = new FakeStateFinder();
    detector = new StateDetector(registry, memory, finder);
  });

  describe('probe', () => {
    it('adds the state when evidence is found', async () => {
      finder.show(2);
      expect(await detector.probe(2)).toBe(true);
      expect(memory.has(2)).toBe(true);
    });

    it('returns false without evidence', async () => {
      expect(await detector.probe(1)).toBe(false);
      expect(memory.isEmpty()).toBe(true);
    });

    it('never searches for special or unregistered ids', async () => {
      expect(await detector.probe(SpecialStateType.UNKNOWN)).toBe(false);
      expect(await detector.probe(99)).toBe(false);
      expect(finder.find).not.toHaveBeenCalled();
    });

    it('propagates finder failures', async () => {
      finder.failing.add(1);
      await expect(detector.probe(1)).rejects.toThrow('capture failed for Login');
    });
  });

  describe('checkActiveStates', () => {
    it('keeps visible states and drops the rest', async () => {
      memory.add(1);
      memory.add(2);
      memory.add(3);
      finder.show(1, 3);

      const still = await detector.checkActiveStates();

      expect(still).toEqual(new Set([1, 3]));
      expect(memory.has(2)).toBe(false);
    });

    it('handles an empty memory', async () => {
      expect((await detector.checkActiveStates()).size).toBe(0);
      expect(finder.find).not.toHaveBeenCalled();
    });

    it('drops markers that cannot be confirmed', async () => {
      memory.add(SpecialStateType.UNKNOWN);
      expect((await detector.checkActiveStates()).size).toBe(0);
    });
  });

  describe('refreshStates', () => {
    it('clears memory and searches everything', async () => {
      memory.add(1);
      finder.show(2, 3);
      expect(await detector.refreshStates()).toEqual(new Set([2, 3]));
      expect(finder.find).toHaveBeenCalledTimes(3);
    });
  });

  describe('rebuildActiveStates', () => {
    it('keeps what is still visible without a full search', async () => {
      memory.add(1);
      finder.show(1, 2);
      expect(await detector.rebuildActiveStates()).toEqual(new Set([1]));
      expect(finder.find).toHaveBeenCalledTimes(1);
    });

    it('searches everything when nothing active is visible', async () => {
      memory.add(1);
      finder.show(3);
      expect(await detector.rebuildActiveStates()).toEqual(new Set([3]));
    });

    it('falls back to UNKNOWN', async () => {
      const logger = makeMockLogger();
      const logged = new StateDetector(registry, memory, finder, { logger });
      expect(await logged.rebuildActiveStates()).toEqual(new Set([SpecialStateType.UNKNOWN]));
      expect(logger.warn).toHaveBeenCalledWith('No state found on screen; marking UNKNOWN');
    });
  });
});
