import { describe, expect, it } from "vitest";

import { containsPoint, createBoundingBox } from "../geometry/boundingBox";
import type { BoundingBox } from "../geometry/boundingBox";
import { TargetSelector } from "./targetSelector";

function boxAround(cx: number, cy: number, half = 10, classId = 0): BoundingBox {
  return createBoundingBox({
    x1: cx - half,
    y1: cy - half,
    x2: cx + half,
    y2: cy + half,
    score: 0.8,
    classId
  });
}

describe("TargetSelector", () => {
  it("returns none and clears state for an empty frame", () => {
    const selector = new TargetSelector();
    selector.select([boxAround(100, 100)], { x: 0, y: 0 });

    expect(selector.select([], { x: 0, y: 0 })).toEqual({ kind: "none" });
    expect(selector.getCandidates()).toEqual([]);
    expect(selector.getCurrentTarget()).toEqual({ kind: "none" });
  });

  it("excludes the box that contains the screen center", () => {
    const selector = new TargetSelector();
    const away = boxAround(1000, 540);
    const self = createBoundingBox({ x1: 950, y1: 530.001, x2: 970, y2: 549.999, score: 0.95, classId: 0 });

    const selection = selector.select([away, self], { x: 0, y: 0 });

    expect(selection).toEqual({ kind: "locked", box: away });
    expect(selector.getCandidates()).toEqual([away]);
  });

  it("treats the anchor on a box edge as contained", () => {
    const selector = new TargetSelector();
    const touching = createBoundingBox({ x1: 960, y1: 500, x2: 1000, y2: 540, score: 0.7, classId: 1 });

    expect(selector.select([touching], { x: 980, y: 520 })).toEqual({ kind: "none" });
    expect(selector.getCandidates()).toEqual([]);
    expect(selector.getCurrentTarget()).toEqual({ kind: "none" });
  });

  it("picks the candidate nearest the cursor", () => {
    const selector = new TargetSelector();
    const far = boxAround(100, 100);
    const near = boxAround(480, 470);
    const mid = boxAround(300, 500);

    const selection = selector.select([far, near, mid], { x: 500, y: 500 });

    expect(selection).toEqual({ kind: "locked", box: near });
    expect(selector.getCandidates()).toEqual([far, near, mid]);
  });

  it("breaks exact ties by input order", () => {
    const selector = new TargetSelector();
    const left = boxAround(400, 500, 10, 1);
    const right = boxAround(600, 500, 10, 2);
    const cursor = { x: 500, y: 500 };

    expect(selector.select([left, right], cursor)).toEqual({ kind: "locked", box: left });
    expect(selector.select([right, left], cursor)).toEqual({ kind: "locked", box: right });
  });

  it("uses an explicit anchor over the space center", () => {
    const selector = new TargetSelector({ space: { width: 1920, height: 1080 }, anchor: { x: 100, y: 100 } });
    const covering = boxAround(100, 100);
    const center = boxAround(960, 540);

    expect(selector.getAnchor()).toEqual({ x: 100, y: 100 });
    expect(selector.select([covering, center], { x: 100, y: 100 })).toEqual({ kind: "locked", box: center });
  });

  it("derives the anchor from the configured space", () => {
    const selector = new TargetSelector({ space: { width: 800, height: 600 } });
    expect(selector.getAnchor()).toEqual({ x: 400, y: 300 });
  });

  it("hands out a copy of the candidates", () => {
    const selector = new TargetSelector();
    selector.select([boxAround(10, 10)], { x: 0, y: 0 });

    const copy = selector.getCandidates();
    expect(copy).not.toBe(selector.getCandidates());
    expect(copy).toHaveLength(1);
  });

  it("never returns a box containing the anchor", () => {
    const selector = new TargetSelector();
    const anchor = selector.getAnchor();
    const boxes: BoundingBox[] = [];
    for (let i = 0; i < 12; i += 1) {
      boxes.push(boxAround(900 + i * 10, 500 + i * 8, 5 + i * 3));
    }

    for (let i = 0; i < boxes.length; i += 1) {
      const selection = selector.select(boxes.slice(i), { x: 960, y: 540 });
      if (selection.kind === "locked") {
        expect(containsPoint(selection.box, anchor)).toBe(false);
      }
      for (const candidate of selector.getCandidates()) {
        expect(containsPoint(candidate, anchor)).toBe(false);
      }
    }
  });
});
