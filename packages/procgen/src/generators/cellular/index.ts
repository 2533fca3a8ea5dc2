/**
 * Cave generator module
 */

export * from "./constants";
export { createCavePipeline } from "./generator";
export {
  CavePasses,
  carveTunnel,
  connectRegions,
  describeSection,
  detectRooms,
  noiseFill,
  smoothCaves,
} from "./passes";
