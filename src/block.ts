import { Addr, MemoryBlock } from './types';

export const newBlock = (baseAddress: Addr, length: number): MemoryBlock => {
  return { baseAddress, length };
};

// The first address past the end of [block].
export const blockEnd = (block: MemoryBlock): Addr => {
  return block.baseAddress + block.length;
};

export const blockToString = (block: MemoryBlock): string => {
  return `(${block.baseAddress} , ${block.length})`;
};

// Every block is followed by a single space, so a non-empty list always ends
// with one and an empty list renders as the empty string.
export const blockListToString = (blocks: MemoryBlock[]): string => {
  return blocks.map((block) => `${blockToString(block)} `).join('');
};
