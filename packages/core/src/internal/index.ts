/**
 * Internal modules barrel export
 */

// Constants
export {
  MAX_CAPACITY,
  BLOCK_SIZE,
  GRID_SIZE,
  CELL_COUNT,
  EMPTY_CELL,
} from './constants';

// Utils
export { nextPow2, isPow2, assertCount, assertIndex } from './utils';

// Slots (owned storage)
export {
  slotsEmpty,
  slotsFilled,
  slotsCopy,
  slotsRealloc,
  slotsEnsure,
  slotsPush,
  slotsPop,
  slotsInsertFill,
  slotsErase,
  slotsResize,
  slotsReserve,
  slotsShrink,
  slotsClear,
  slotsSwap,
  slotsIter,
} from './slots';

// Ordering
export { defaultCompare, slotsCompare } from './compare';

// Types
export type { Slots, Comparator, DynArrayOptions } from './types';
