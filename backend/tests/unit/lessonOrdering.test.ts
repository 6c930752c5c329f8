import {
  changedOrders,
  insertAtEnd,
  isContiguous,
  moveTo,
  remove,
  renumber,
  resolveOrder,
} from '../../src/utils/lessonOrdering.js';
import { NotFoundError, ValidationError } from '../../src/utils/AppError.js';

const item = (id: string, order: number) => ({ id, order });
const ids = (items: { id: string }[]) => items.map((i) => i.id);
const orders = (items: { order: number }[]) => items.map((i) => i.order);

describe('lessonOrdering', () => {
  describe('insertAtEnd', () => {
    it('should number inserted lessons 1, 2, 3', () => {
      let lessons: { id: string; order: number }[] = [];
      lessons = insertAtEnd(lessons, item('a', 0));
      lessons = insertAtEnd(lessons, item('b', 0));
      lessons = insertAtEnd(lessons, item('c', 0));

      expect(lessons).toEqual([item('a', 1), item('b', 2), item('c', 3)]);
    });

    it('should close gaps before appending', () => {
      const lessons = insertAtEnd([item('a', 2), item('b', 7)], item('c', 0));
      expect(lessons).toEqual([item('a', 1), item('b', 2), item('c', 3)]);
    });
  });

  describe('moveTo', () => {
    const three = [item('a', 1), item('b', 2), item('c', 3)];

    it('should move the last lesson to the front and shift the rest down', () => {
      const result = moveTo(three, 'c', 1);
      expect(result).toEqual([item('c', 1), item('a', 2), item('b', 3)]);
    });

    it('should move a lesson later and shift the ones in between up', () => {
      const result = moveTo(three, 'a', 3);
      expect(result).toEqual([item('b', 1), item('c', 2), item('a', 3)]);
    });

    it('should leave the sequence untouched when the position does not change', () => {
      expect(moveTo(three, 'b', 2)).toEqual(three);
    });

    it('should produce the same sequence when the same move is applied twice', () => {
      const once = moveTo(three, 'c', 1);
      expect(moveTo(once, 'c', 1)).toEqual(once);
    });

    it('should clamp positions outside [1, N]', () => {
      expect(ids(moveTo(three, 'a', 99))).toEqual(['b', 'c', 'a']);
      expect(ids(moveTo(three, 'c', -4))).toEqual(['c', 'a', 'b']);
      expect(ids(moveTo(three, 'b', 0))).toEqual(['b', 'a', 'c']);
    });

    it('should accept integer strings', () => {
      expect(ids(moveTo(three, 'c', '2'))).toEqual(['a', 'c', 'b']);
    });

    it('should reject non-integer positions', () => {
      expect(() => moveTo(three, 'a', 1.5)).toThrow(ValidationError);
      expect(() => moveTo(three, 'a', 'first')).toThrow('Order must be an integer');
    });

    it('should reject lessons that are not in the course', () => {
      expect(() => moveTo(three, 'zzz', 1)).toThrow(NotFoundError);
    });

    it('should not mutate its input', () => {
      const input = [item('a', 1), item('b', 2)];
      moveTo(input, 'b', 1);
      expect(input).toEqual([item('a', 1), item('b', 2)]);
    });
  });

  describe('remove', () => {
    it('should renumber the remaining lessons after deleting the middle one', () => {
      const result = remove([item('a', 1), item('b', 2), item('c', 3)], 'b');
      expect(result).toEqual([item('a', 1), item('c', 2)]);
    });

    it('should return an empty sequence when the only lesson is removed', () => {
      expect(remove([item('a', 1)], 'a')).toEqual([]);
    });

    it('should throw when the lesson is missing', () => {
      expect(() => remove([item('a', 1)], 'b')).toThrow('Lesson not found in this course');
    });
  });

  describe('helpers', () => {
    it('should renumber by ascending order', () => {
      expect(orders(renumber([item('x', 10), item('y', 4)]))).toEqual([1, 2]);
      expect(ids(renumber([item('x', 10), item('y', 4)]))).toEqual(['y', 'x']);
    });

    it('should detect contiguous sequences', () => {
      expect(isContiguous([item('b', 2), item('a', 1)])).toBe(true);
      expect(isContiguous([item('a', 1), item('b', 3)])).toBe(false);
      expect(isContiguous([])).toBe(true);
    });

    it('should list only the lessons whose order changed', () => {
      const before = [item('a', 1), item('b', 2), item('c', 3)];
      expect(changedOrders(before, moveTo(before, 'c', 1))).toEqual([item('c', 1), item('a', 2), item('b', 3)]);
      expect(changedOrders(before, moveTo(before, 'b', 3))).toEqual([item('c', 2), item('b', 3)]);
    });

    it('should parse positions', () => {
      expect(resolveOrder(4)).toBe(4);
      expect(resolveOrder(' 7 ')).toBe(7);
      expect(() => resolveOrder(null)).toThrow(ValidationError);
    });
  });
});
