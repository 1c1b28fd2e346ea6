import {
  wrap,
  wrapPosition,
  positionsEqual,
  horizontalSeparation,
  getPositionInDirection,
  getOppositeDirection,
  getDirectionFromStep,
} from "../utils/position";
import { Direction } from "../types";

describe("Position Utils", () => {
  describe("wrap", () => {
    it("should keep in-range values", () => {
      expect(wrap(3, 10)).toBe(3);
    });

    it("should wrap values past the last index", () => {
      expect(wrap(10, 10)).toBe(0);
      expect(wrap(23, 10)).toBe(3);
    });

    it("should wrap negative values", () => {
      expect(wrap(-1, 10)).toBe(9);
      expect(wrap(-11, 10)).toBe(9);
    });
  });

  describe("wrapPosition", () => {
    it("should wrap both axes independently", () => {
      expect(wrapPosition({ x: -1, y: 12 }, 10, 8)).toEqual({ x: 9, y: 4 });
    });
  });

  describe("positionsEqual", () => {
    it("should return true for equal positions", () => {
      expect(positionsEqual({ x: 4, y: 2 }, { x: 4, y: 2 })).toBe(true);
    });

    it("should return false for different positions", () => {
      expect(positionsEqual({ x: 4, y: 2 }, { x: 5, y: 2 })).toBe(false);
    });
  });

  describe("horizontalSeparation", () => {
    it("should ignore the vertical axis", () => {
      expect(horizontalSeparation({ x: 5, y: 0 }, { x: 6, y: 9 })).toBe(1);
    });

    it("should not take the wrapped way round", () => {
      expect(horizontalSeparation({ x: 0, y: 3 }, { x: 9, y: 3 })).toBe(9);
    });
  });

  describe("getPositionInDirection", () => {
    it("should step one cell in each direction", () => {
      const from = { x: 5, y: 5 };

      expect(getPositionInDirection(from, Direction.UP, 10, 10)).toEqual({ x: 5, y: 4 });
      expect(getPositionInDirection(from, Direction.DOWN, 10, 10)).toEqual({ x: 5, y: 6 });
      expect(getPositionInDirection(from, Direction.LEFT, 10, 10)).toEqual({ x: 4, y: 5 });
      expect(getPositionInDirection(from, Direction.RIGHT, 10, 10)).toEqual({ x: 6, y: 5 });
    });

    it("should wrap around the board edges", () => {
      expect(getPositionInDirection({ x: 9, y: 0 }, Direction.RIGHT, 10, 10)).toEqual({ x: 0, y: 0 });
      expect(getPositionInDirection({ x: 9, y: 0 }, Direction.UP, 10, 10)).toEqual({ x: 9, y: 9 });
    });
  });

  describe("getOppositeDirection", () => {
    it("should reverse every direction", () => {
      expect(getOppositeDirection(Direction.UP)).toBe(Direction.DOWN);
      expect(getOppositeDirection(Direction.DOWN)).toBe(Direction.UP);
      expect(getOppositeDirection(Direction.LEFT)).toBe(Direction.RIGHT);
      expect(getOppositeDirection(Direction.RIGHT)).toBe(Direction.LEFT);
    });
  });

  describe("getDirectionFromStep", () => {
    it("should read plain steps", () => {
      expect(getDirectionFromStep({ x: 2, y: 2 }, { x: 3, y: 2 }, 10, 10)).toBe(Direction.RIGHT);
      expect(getDirectionFromStep({ x: 2, y: 2 }, { x: 2, y: 1 }, 10, 10)).toBe(Direction.UP);
    });

    it("should read wrapped steps", () => {
      expect(getDirectionFromStep({ x: 9, y: 4 }, { x: 0, y: 4 }, 10, 10)).toBe(Direction.RIGHT);
      expect(getDirectionFromStep({ x: 3, y: 0 }, { x: 3, y: 9 }, 10, 10)).toBe(Direction.UP);
    });

    it("should return null for cells that are not neighbours", () => {
      expect(getDirectionFromStep({ x: 2, y: 2 }, { x: 4, y: 2 }, 10, 10)).toBeNull();
      expect(getDirectionFromStep({ x: 2, y: 2 }, { x: 3, y: 3 }, 10, 10)).toBeNull();
    });
  });
});
