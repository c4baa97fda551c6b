export {
  ProximityFusion,
  createProximityFusion,
  type CreateProximityFusionOptions,
  type ProximityFusionOptions,
  type ProximitySnapshot,
} from "./proximity-fusion";

export {
  ProximityCheck,
  type ProximityCheckCallback,
} from "./proximity-check";
