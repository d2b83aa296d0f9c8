/**
 * macroprobe: Main entry point
 * Exports the discovery run, the constant entity and the resolver interface
 */

export { MacroDiscovery, DiscoveryDependencies } from "../tooling/lib/discovery";
export { Constant, ConstantInit, ConstantJSON } from "../tooling/lib/constant";
export {
  ExpressionResolver,
  CompilerExpressionResolver,
  decodeNativeValue,
  isTypeTag,
} from "../tooling/lib/resolver";
export { classifyRawValue } from "../tooling/lib/classifier";
export { ConfigManager, toDiscoveryConfig } from "../tooling/lib/config";
export {
  MacroProbeError,
  ConfigurationError,
  ToolInvocationError,
  ProbeBuildError,
  ProbeLoadError,
} from "../tooling/lib/errors";
export { Logger, LogLevel } from "../tooling/lib/logger";
export { AuditLog, ResolutionFailure } from "../tooling/lib/audit";
export {
  TYPE_TAGS,
  TypeTag,
  ConstantValue,
  OpaquePointer,
  DiscoveryOptions,
  DiscoveryConfig,
  ParseWarning,
} from "../tooling/lib/types";
