export { aStar, type AStarOptions, type AStarResult } from "./astar.js";
export { MinHeap } from "./min-heap.js";
