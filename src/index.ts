export { SurfaceGrid } from "./grid/surface-grid";
export {
  RectangleSpherePoint, RectangleTopology, createRectangleSphereGrid, createRectangleSphereGridPar,
} from "./grid/rectangle-topology";
export { CubeSpherePoint, CubeTopology, createCubeSphereGrid, createCubeSphereGridPar } from "./grid/cube-topology";
export { CUBE_FACES, CUBE_ADJACENCY, CUBE_FACE_FRAMES } from "./grid/cube-face";
export type { CubeFace, EdgeCoordinate, EdgeCrossing, FaceFrame } from "./grid/cube-face";
export type { RowPartition } from "./grid/partition";
export { latLonToPosition, positionToLatLon, foldGeographic } from "./utils/sphere-math";
export { DoubleBufferedAutomaton } from "./simulation/automaton";
export type { Neighbourhood } from "./simulation/automaton";
export { lifeRule, population } from "./simulation/life";
export type {
  Vec3, Direction, GridPoint, SpherePoint, Topology,
  PointFn, NeighboursFn, DiagonalNeighboursFn, ParallelOptions,
} from "./types/grid-types";
