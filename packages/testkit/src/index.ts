export { createTempRoot, removeDir, withTempDir } from "./fs.js";
export { FaultyStore, type Primitive, type PrimitiveCall } from "./faulty.js";
