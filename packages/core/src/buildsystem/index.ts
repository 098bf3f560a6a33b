export {
  DETECTION_ORDER,
  dependencies,
  detectBuildStrategy,
  installProcedure,
  strategyName,
  testProcedure,
  type BuildStrategy,
  type BuildSystemKind,
  type InstallOptions
} from "./strategies";
