import { Simulation } from "./simulation";
import { createSeedMask } from "./seed-presets";
import { livingNeighbours } from "./neighbors";
import { ALIVE, DEAD } from "../types/grid-types";

describe("Simulation", () => {
  it("rejects an arena too small for the neighbourhood", () => {
    expect(() => new Simulation(1)).toThrow(RangeError);
  });

  it("steps the smallest arena without leaving the grid", () => {
    const sim = new Simulation(2);
    sim.flipAtCursor();
    expect(sim.grid.get(1, 1, 1)).toBe(ALIVE);
    // Seven of the 26 offsets reflect back onto (1, 1, 1), so it dies
    expect(livingNeighbours(sim.grid, 1, 1, 1)).toBe(7);
    sim.step();
    expect(sim.grid.liveCount()).toBe(0);
    expect(sim.generation).toBe(1);
  });

  it("starts with an all-dead grid at generation 0", () => {
    const sim = new Simulation(6);
    expect(sim.grid.size).toBe(6);
    expect(sim.grid.liveCount()).toBe(0);
    expect(sim.generation).toBe(0);
  });

  it("replaces the grid and counts generations on step", () => {
    const sim = new Simulation(6);
    const first = sim.grid;
    sim.step();
    expect(sim.grid).not.toBe(first);
    expect(sim.generation).toBe(1);
    sim.step();
    expect(sim.generation).toBe(2);
  });

  it("flips the cell under the cursor", () => {
    const sim = new Simulation(6);
    const { x, y, z } = sim.cursor;
    sim.flipAtCursor();
    expect(sim.grid.get(x, y, z)).toBe(ALIVE);
    sim.flipAtCursor();
    expect(sim.grid.get(x, y, z)).toBe(DEAD);
  });

  it("reset loads a seed mask and rewinds the generation count", () => {
    const sim = new Simulation(8);
    sim.step();
    sim.reset(createSeedMask("centre-block", 8));
    expect(sim.generation).toBe(0);
    expect(sim.grid.liveCount()).toBe(8);
    expect(sim.grid.get(3, 3, 3)).toBe(ALIVE);
  });

  it("reset without a mask clears the arena", () => {
    const sim = new Simulation(4);
    sim.flipAtCursor();
    sim.reset();
    expect(sim.grid.liveCount()).toBe(0);
  });

  it("reset rejects a mask of the wrong size", () => {
    const sim = new Simulation(4);
    expect(() => sim.reset(new Uint8Array(10))).toThrow(RangeError);
  });
});
