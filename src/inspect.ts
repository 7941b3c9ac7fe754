import { MemoryBlock, MemorySnapshot, MemorySpace } from './types';
import { blockEnd, blockToString } from './block';

const totalLength = (blocks: MemoryBlock[]) => {
  return blocks.reduce((sum, block) => sum + block.length, 0);
};

export const freeBytes = (space: MemorySpace): number => {
  return totalLength(space.free);
};

export const allocatedBytes = (space: MemorySpace): number => {
  return totalLength(space.allocated);
};

// malloc(n) succeeds exactly when n is no larger than this.
export const largestFreeBlock = (space: MemorySpace): number => {
  return space.free.reduce(
    (largest, block) => Math.max(largest, block.length),
    0,
  );
};

// 0 when all free memory is one block, approaching 1 as it is scattered over
// many small ones.
export const fragmentation = (space: MemorySpace): number => {
  const total = freeBytes(space);
  if (total === 0) return 0;
  return 1 - largestFreeBlock(space) / total;
};

export const snapshot = (space: MemorySpace): MemorySnapshot => {
  return {
    maxSize: space.maxSize,
    free: space.free.map((block) => ({ ...block })),
    allocated: space.allocated.map((block) => ({ ...block })),
  };
};

// Walks both lists and reports every way they fail to tile [0, maxSize):
// empty or out-of-range blocks, overlaps and gaps. Returns no messages when
// the space is consistent.
export const checkInvariants = (space: MemorySpace): string[] => {
  const problems: string[] = [];
  const tagged = [
    ...space.free.map((block) => ({ block, list: 'free' })),
    ...space.allocated.map((block) => ({ block, list: 'allocated' })),
  ];

  for (const { block, list } of tagged) {
    const name = `${list} block ${blockToString(block)}`;
    if (
      !Number.isSafeInteger(block.baseAddress) ||
      !Number.isSafeInteger(block.length)
    ) {
      problems.push(`${name} is not integral`);
    }
    if (block.length <= 0) {
      problems.push(`${name} is empty`);
    }
    if (block.baseAddress < 0 || blockEnd(block) > space.maxSize) {
      problems.push(`${name} lies outside [0, ${space.maxSize})`);
    }
  }

  const ordered = tagged
    .map(({ block }) => block)
    .sort((a, b) => a.baseAddress - b.baseAddress);

  let expected = 0;
  for (const block of ordered) {
    if (block.baseAddress < expected) {
      problems.push(
        `${blockToString(block)} overlaps the range ending at ${expected}`,
      );
    } else if (block.baseAddress > expected) {
      problems.push(`gap between ${expected} and ${block.baseAddress}`);
    }
    expected = Math.max(expected, blockEnd(block));
  }
  if (expected < space.maxSize) {
    problems.push(`gap between ${expected} and ${space.maxSize}`);
  }

  return problems;
};
