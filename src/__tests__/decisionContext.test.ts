import { createDecisionContext } from "../ai/decisionContext";
import { createMatchSession } from "../ai/phaseStateMachine";
import { createSnapshot } from "./fixtures";

describe("createDecisionContext", () => {
  it("should wrap stored trail cells onto the snapshot board", () => {
    const snapshot = createSnapshot({
      self: [{ x: 5, y: 5 }],
      opponent: [{ x: 0, y: 0 }],
    });
    snapshot.agents[1].trail = [{ x: 15, y: 5 }];
    snapshot.agents[2].trail = [{ x: 10, y: -10 }];

    const context = createDecisionContext(snapshot, 1, createMatchSession());

    expect(context?.head).toEqual({ x: 5, y: 5 });
    expect(context?.opponentHead).toEqual({ x: 0, y: 0 });
    expect(context && [...context.occupied].sort()).toEqual(["0,0", "5,5"]);
    expect(context?.corridor).toEqual({ row: 0, exitColumn: 5 });
    expect(context?.candidates.map((c) => c.score)).toEqual([89, 89, 89]);
  });

  it("should plan the corridor from the first trail cell", () => {
    const snapshot = createSnapshot({
      self: [
        { x: 2, y: 1 },
        { x: 3, y: 1 },
      ],
      opponent: [{ x: 9, y: 9 }],
    });

    const context = createDecisionContext(snapshot, 1, createMatchSession());

    expect(context?.head).toEqual({ x: 3, y: 1 });
    expect(context?.corridor).toEqual({ row: 6, exitColumn: 2 });
  });

  it("should keep the corridor fixed in the session", () => {
    const snapshot = createSnapshot({
      self: [{ x: 2, y: 1 }],
      opponent: [{ x: 9, y: 9 }],
    });
    const session = { ...createMatchSession(), corridor: { row: 4, exitColumn: 7 } };

    expect(createDecisionContext(snapshot, 1, session)?.corridor).toEqual({
      row: 4,
      exitColumn: 7,
    });
  });

  it("should leave the opponent head out when the opponent is dead", () => {
    const snapshot = createSnapshot({
      self: [{ x: 2, y: 1 }],
      opponent: [{ x: 9, y: 9 }],
      opponentAlive: false,
    });

    expect(createDecisionContext(snapshot, 1, createMatchSession())?.opponentHead).toBeNull();
  });

  it("should return null without a trail", () => {
    const snapshot = createSnapshot({ self: [], opponent: [{ x: 9, y: 9 }] });

    expect(createDecisionContext(snapshot, 1, createMatchSession())).toBeNull();
  });
});
