import type { OrderedItem } from '../types/commonTypes.js';
import { NotFoundError, ValidationError } from './AppError.js';

/**
 * Dense 1-based ordering of the lessons inside one course.
 *
 * Every operation takes the course's current lessons and returns the whole
 * sequence, ascending and renumbered, so the caller can persist it as one batch.
 * Inputs are never mutated.
 */

export const sortByOrder = <T extends OrderedItem>(items: readonly T[]): T[] =>
  [...items].sort((a, b) => a.order - b.order);

/** Reassigns orders 1..N following the current sort. */
export const renumber = <T extends OrderedItem>(items: readonly T[]): T[] =>
  sortByOrder(items).map((item, index) => (item.order === index + 1 ? item : { ...item, order: index + 1 }));

export const isContiguous = (items: readonly OrderedItem[]): boolean =>
  sortByOrder(items).every((item, index) => item.order === index + 1);

/**
 * Parses a requested position. Accepts integers and integer strings ("3");
 * anything else is rejected.
 */
export const resolveOrder = (value: unknown): number => {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  throw ValidationError.forField('order', 'Order must be an integer');
};

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

const locate = <T extends OrderedItem>(items: readonly T[], id: string): T => {
  const item = items.find((candidate) => candidate.id === id);
  if (!item) throw new NotFoundError('Lesson not found in this course');
  return item;
};

export const insertAtEnd = <T extends OrderedItem>(items: readonly T[], item: T): T[] => {
  const sequence = renumber(items);
  return [...sequence, { ...item, order: sequence.length + 1 }];
};

/**
 * Moves one lesson to `newOrder` (clamped to [1, N]). Lessons between the old
 * and the new position shift by one towards the gap it leaves.
 */
export const moveTo = <T extends OrderedItem>(items: readonly T[], id: string, newOrder: unknown): T[] => {
  const requested = resolveOrder(newOrder);
  const sequence = renumber(items);
  const from = locate(sequence, id).order;
  const to = clamp(requested, 1, sequence.length);

  if (from === to) return sequence;

  return sortByOrder(
    sequence.map((item) => {
      if (item.id === id) return { ...item, order: to };
      if (to < from && item.order >= to && item.order < from) return { ...item, order: item.order + 1 };
      if (to > from && item.order > from && item.order <= to) return { ...item, order: item.order - 1 };
      return item;
    })
  );
};

export const remove = <T extends OrderedItem>(items: readonly T[], id: string): T[] => {
  const sequence = renumber(items);
  const removed = locate(sequence, id);

  return sequence
    .filter((item) => item.id !== id)
    .map((item) => (item.order > removed.order ? { ...item, order: item.order - 1 } : item));
};

/** Positions in `next` that differ from `previous`, i.e. the writes a batch needs. */
export const changedOrders = (previous: readonly OrderedItem[], next: readonly OrderedItem[]): OrderedItem[] => {
  const before = new Map(previous.map((item) => [item.id, item.order]));
  return next
    .filter((item) => before.has(item.id) && before.get(item.id) !== item.order)
    .map(({ id, order }) => ({ id, order }));
};
