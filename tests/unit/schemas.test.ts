import { MoveSchema, parseGameStateSnapshot } from '../../src/shared/validation/schemas';
import { snapshotOf } from '../../src/shared/engine/gameState';

describe('validation schemas', () => {
  describe('MoveSchema', () => {
    it('accepts pit and swap moves', () => {
      expect(MoveSchema.parse({ type: 'pit', pit: 3 })).toEqual({ type: 'pit', pit: 3 });
      expect(MoveSchema.parse({ type: 'swap' })).toEqual({ type: 'swap' });
    });

    it('rejects pit 0 and unknown types', () => {
      expect(MoveSchema.safeParse({ type: 'pit', pit: 0 }).success).toBe(false);
      expect(MoveSchema.safeParse({ type: 'pass' }).success).toBe(false);
    });
  });

  describe('parseGameStateSnapshot', () => {
    it('fills omitted fields with start-of-game values', () => {
      const result = parseGameStateSnapshot({ rows: [[1, 2], [3, 4]] });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(snapshotOf(result.state)).toEqual({
          rows: [
            [1, 2],
            [3, 4],
          ],
          stores: [0, 0],
          ply: 1,
          currentTurn: 1,
          player2Moved: false,
        });
      }
    });

    it('keeps every given field', () => {
      const input = {
        rows: [[0, 5], [2, 0]],
        stores: [10, 7],
        ply: 9,
        currentTurn: 2,
        player2Moved: true,
      };
      const result = parseGameStateSnapshot(input);
      expect(result.success && snapshotOf(result.state)).toEqual(input);
    });

    it('reports rows of different lengths', () => {
      expect(parseGameStateSnapshot({ rows: [[1, 2], [3]] })).toEqual({
        success: false,
        errors: ['rows: Both rows must have the same number of pits'],
      });
    });

    it('reports bad counts with their path', () => {
      const result = parseGameStateSnapshot({ rows: [[1, -2], [3, 4]], currentTurn: 3 });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors.map((e) => e.split(':')[0])).toEqual(['rows.0.1', 'currentTurn']);
      }
    });

    it('reports boards too large for the fixed-length shape', () => {
      expect(parseGameStateSnapshot({ rows: [[3000000000, 1], [1, 1]] })).toEqual({
        success: false,
        errors: ['(root): A board holds at most 2147483647 stones (got 3000000003)'],
      });
    });

    it('rejects non-objects at the root', () => {
      const result = parseGameStateSnapshot('board');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors[0].startsWith('(root): ')).toBe(true);
      }
    });
  });
});
