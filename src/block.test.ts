import { newBlock, blockEnd, blockToString, blockListToString } from './block';

it('should compute the first address past a block', () => {
  expect(blockEnd(newBlock(12, 4))).toBe(16);
});

it('should render a block as base and length', () => {
  expect(blockToString(newBlock(20, 30))).toBe('(20 , 30)');
});

it('should follow every block in a list with a space', () => {
  const blocks = [newBlock(0, 20), newBlock(20, 30)];
  expect(blockListToString(blocks)).toBe('(0 , 20) (20 , 30) ');
});

it('should render an empty list as nothing', () => {
  expect(blockListToString([])).toBe('');
});
