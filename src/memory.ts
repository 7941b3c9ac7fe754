import { Addr, MemoryEvent, MemorySpace, MemorySpaceOptions } from './types';
import { blockEnd, blockListToString, newBlock } from './block';
import {
  DEFAULT_EVENT_LIMIT,
  FREE_EMPTY_MESSAGE,
  MALLOC_FAILED,
} from './constants';
import { InvalidArgumentError } from './errors';
import { largestFreeBlock } from './inspect';

const isPositiveInteger = (value: number) => {
  return Number.isSafeInteger(value) && value > 0;
};

// Creates a new space whose whole arena is a single free block.
export const newMemorySpace = (
  maxSize: number,
  options: MemorySpaceOptions = {},
): MemorySpace => {
  if (!isPositiveInteger(maxSize)) {
    throw new InvalidArgumentError(
      `maxSize must be a positive integer, got ${maxSize}`,
    );
  }
  const eventLimit = options.eventLimit ?? DEFAULT_EVENT_LIMIT;
  if (!Number.isSafeInteger(eventLimit) || eventLimit < 0) {
    throw new InvalidArgumentError(
      `eventLimit must be a non-negative integer, got ${eventLimit}`,
    );
  }
  return {
    maxSize,
    free: [newBlock(0, maxSize)],
    allocated: [],
    events: [],
    eventLimit,
    logged: 0,
  };
};

const log = (space: MemorySpace, event: MemoryEvent) => {
  if (space.eventLimit === 0) return;
  space.logged++;
  space.events.push(event);
  const overflow = space.events.length - space.eventLimit;
  if (overflow > 0) {
    space.events.splice(0, overflow);
  }
};

export const clearEvents = (space: MemorySpace) => {
  space.events = [];
};

// Allocates [length] units with a first-fit scan over the free list, in its
// current order. The allocation is carved from the low end of the first block
// that is large enough.
//
// Returns the base address of the new block, or MALLOC_FAILED when no single
// free block can hold it. A failed call leaves the space as it was.
export const malloc = (space: MemorySpace, length: number): Addr => {
  if (!isPositiveInteger(length)) {
    log(space, {
      type: 'error',
      msg: `malloc(${length}): length must be a positive integer`,
    });
    return MALLOC_FAILED;
  }

  const index = space.free.findIndex((block) => block.length >= length);
  if (index === -1) {
    const largest = largestFreeBlock(space);
    log(space, {
      type: 'malloc-failed',
      length,
      largest,
      msg: `malloc(${length}) failed, largest free block is ${largest}`,
    });
    return MALLOC_FAILED;
  }

  const block = space.free[index];
  const address = block.baseAddress;
  space.allocated.push(newBlock(address, length));

  if (block.length === length) {
    // Fully consumed. Zero-length blocks never stay in the free list.
    space.free.splice(index, 1);
  } else {
    block.baseAddress += length;
    block.length -= length;
    log(space, {
      type: 'split',
      from: address,
      remainder: newBlock(block.baseAddress, block.length),
      msg: `split ${address}, ${block.length} left at ${block.baseAddress}`,
    });
  }

  log(space, {
    type: 'malloc',
    length,
    result: address,
    msg: `malloc(${length}) -> ${address}`,
  });
  return address;
};

// Releases the allocated block starting at [address] and appends it to the
// end of the free list. Nothing is merged here; see defrag.
//
// Throws when nothing at all is allocated, whatever the address. An address
// that matches no allocated block is otherwise ignored.
export const free = (space: MemorySpace, address: Addr) => {
  if (space.allocated.length === 0) {
    log(space, {
      type: 'error',
      msg: `free(${address}) with nothing allocated`,
    });
    throw new InvalidArgumentError(FREE_EMPTY_MESSAGE);
  }

  const index = space.allocated.findIndex(
    (block) => block.baseAddress === address,
  );
  if (index === -1) {
    log(space, {
      type: 'free-missing',
      address,
      msg: `free(${address}): no allocated block at this address`,
    });
    return;
  }

  const [block] = space.allocated.splice(index, 1);
  space.free.push(newBlock(block.baseAddress, block.length));
  log(space, {
    type: 'free',
    address,
    length: block.length,
    msg: `free(${address}) released ${block.length}`,
  });
};

// Sorts the free list by address and coalesces neighbouring blocks.
//
// One sweep is enough: once sorted, blocks don't overlap, so after merging
// [next] into [curr] we only need to look at the new neighbour of [curr]
// before moving on.
export const defrag = (space: MemorySpace) => {
  if (space.free.length < 2) return;

  const before = space.free.length;
  space.free = [...space.free].sort((a, b) => a.baseAddress - b.baseAddress);

  const blocks = space.free;
  let i = 0;
  while (i < blocks.length - 1) {
    const curr = blocks[i];
    const next = blocks[i + 1];
    if (blockEnd(curr) === next.baseAddress) {
      curr.length += next.length;
      blocks.splice(i + 1, 1);
    } else {
      i++;
    }
  }

  log(space, {
    type: 'defrag',
    before,
    after: blocks.length,
    msg: `defrag merged ${before} free blocks into ${blocks.length}`,
  });
};

// Two lines: the free list, then the allocated list, each in its current
// order.
export const memoryToString = (space: MemorySpace): string => {
  const free = blockListToString(space.free);
  const allocated = blockListToString(space.allocated);
  return `${free}\n${allocated}`;
};
