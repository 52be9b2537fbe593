import {
  createCubeSphereGrid, createCubeSphereGridPar, createRectangleSphereGrid, createRectangleSphereGridPar,
  CubeTopology, DoubleBufferedAutomaton, lifeRule, population, RectangleTopology,
} from "./index";

describe("package entry point", () => {
  it("builds both sphere grids from an initializer", () => {
    expect(createRectangleSphereGrid(10, 10, (p) => p.x).cellCount).toBe(100);
    expect(createCubeSphereGrid(5, (p) => p.face).cellCount).toBe(150);
  });

  it("builds both sphere grids in parallel", async () => {
    const rectangle = await createRectangleSphereGridPar(10, 10, (p) => p.y, { partitions: 3 });
    const cube = await createCubeSphereGridPar(5, (p) => p.x, { partitions: 4 });
    expect(rectangle.get(new RectangleTopology(10, 10).point(2, 7))).toBe(7);
    expect(cube.get(new CubeTopology(5).point("bottom", 3, 1))).toBe(3);
  });

  it("runs Conway's Game of Life on a cube sphere", () => {
    // a glider on the front face, far from any seam
    const glider = new Set(["front(2,1)", "front(3,2)", "front(1,3)", "front(2,3)", "front(3,3)"]);
    const grid = createCubeSphereGrid(16, (p) => glider.has(p.key()));
    const automaton = new DoubleBufferedAutomaton(grid, { kind: "moore", rule: lifeRule });
    automaton.run(4);
    const live = [...automaton.current].filter(([, alive]) => alive).map(([p]) => p.key());
    expect(live).toEqual(["front(3,2)", "front(4,3)", "front(2,4)", "front(3,4)", "front(4,4)"]);
    expect(population(automaton.current)).toBe(5);
  });
});
