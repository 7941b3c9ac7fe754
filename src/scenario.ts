import { Addr, MemoryEvent, MemorySnapshot, MemorySpace } from './types';
import { defrag, free, malloc } from './memory';
import { snapshot } from './inspect';

export type Step =
  | { op: 'malloc'; length: number }
  | { op: 'free'; address: Addr }
  | { op: 'defrag' };

export interface ScenarioResult {
  // One snapshot per step, taken right after it ran.
  snapshots: MemorySnapshot[];
  // What every malloc step returned, failures included.
  addresses: Addr[];
  // What the space logged during the run, oldest first. Events dropped by the
  // space's event limit are missing here too.
  events: MemoryEvent[];
}

// Replays [steps] against [space]. A free that throws stops the run.
export const runScenario = (
  space: MemorySpace,
  steps: Step[],
): ScenarioResult => {
  const loggedBefore = space.logged;
  const snapshots: MemorySnapshot[] = [];
  const addresses: Addr[] = [];

  for (const step of steps) {
    switch (step.op) {
      case 'malloc':
        addresses.push(malloc(space, step.length));
        break;
      case 'free':
        free(space, step.address);
        break;
      case 'defrag':
        defrag(space);
        break;
    }
    snapshots.push(snapshot(space));
  }

  const count = Math.min(space.logged - loggedBefore, space.events.length);
  const events = space.events.slice(space.events.length - count);
  return { snapshots, addresses, events };
};
