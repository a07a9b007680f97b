export { JournaledMap } from "./journaled-map.js";
export type { Snapshottable } from "./types.js";
export { UnitOfWork } from "./unit-of-work.js";
