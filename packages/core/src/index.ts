/**
 * Core module exports for @erasure-primer/core
 *
 * This package provides:
 * - Capability contracts and conformance checks
 * - Registries (generic, and implementers of one capability)
 * - The diagnostic catalog and PrimerError
 * - Configuration and logging
 */

// Capability contracts
export {
  defineCapability,
  requirementKeys,
  isRequirement,
  isRequirementValue,
  checkConformance,
  conforms,
  assertConforms,
  concreteTypeName,
  constructorOf,
  type RequirementKind,
  type KindFor,
  type Requirements,
  type CapabilityContract,
  type Violation,
} from "./capability.js";

// Registries
export {
  createGenericRegistry,
  createImplementerRegistry,
  type DuplicateStrategy,
  type RegistryOptions,
  type GenericRegistry,
  type ImplementerFactory,
  type ImplementerRegistry,
  type RandomSource,
} from "./registry.js";

// Diagnostics
export {
  DiagnosticCategory,
  DiagnosticBuilder,
  PrimerError,
  isPrimerError,
  primerError,
  formatCode,
  getDescriptor,
  allDescriptors,
  renderDiagnostic,
  explain,
  EP1001,
  EP1002,
  EP1003,
  EP1004,
  EP1005,
  EP1006,
  EP1007,
  EP1008,
  type Severity,
  type DiagnosticDescriptor,
  type RenderOptions,
} from "./diagnostics.js";

// Configuration System
export {
  config,
  defineConfig,
  type PrimerConfig,
  type OpaqueConfig,
  type OutputConfig,
} from "./config.js";

// Logging
export { createLogger, type Logger, type LogLevel, type LogSink } from "./logger.js";
