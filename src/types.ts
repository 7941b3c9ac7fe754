export type Addr = number;

// A contiguous range of the arena: [baseAddress, baseAddress + length).
// Free blocks are adjusted in place when an allocation is carved out of them.
export interface MemoryBlock {
  baseAddress: Addr;
  length: number;
}

export type MemoryEvent =
  | { type: 'malloc'; length: number; result: Addr; msg: string }
  | { type: 'malloc-failed'; length: number; largest: number; msg: string }
  | { type: 'split'; from: Addr; remainder: MemoryBlock; msg: string }
  | { type: 'free'; address: Addr; length: number; msg: string }
  | { type: 'free-missing'; address: Addr; msg: string }
  | { type: 'defrag'; before: number; after: number; msg: string }
  | { type: 'error'; msg: string };

export interface MemorySpaceOptions {
  // How many events the space keeps before dropping the oldest ones. Zero
  // turns the log off.
  eventLimit?: number;
}

// A fixed-size arena of [0, maxSize). Every address in it belongs to exactly
// one block, either in [free] or in [allocated].
export type MemorySpace = {
  readonly maxSize: number;

  // Ranges that are not in use. Kept in insertion order; only sorted and
  // merged right after a defrag.
  free: MemoryBlock[];

  // Ranges handed out by malloc, in the order they were handed out.
  allocated: MemoryBlock[];

  events: MemoryEvent[];
  readonly eventLimit: number;

  // How many events were ever logged, including those since dropped or
  // cleared.
  logged: number;
};

export interface MemorySnapshot {
  maxSize: number;
  free: MemoryBlock[];
  allocated: MemoryBlock[];
}
