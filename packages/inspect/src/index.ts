/**
 * @erasure-primer/inspect: what the compiler knows about a return type.
 *
 * ```typescript
 * inspectSource(`
 *   interface Vehicle { readonly price: number }
 *   class Tesla implements Vehicle { readonly price = 80000 }
 *   function anyVehicle(): Vehicle { return new Tesla(); }
 * `);
 * // [{ name: "anyVehicle", style: "existential", typeText: "Vehicle" }]
 * ```
 *
 * @packageDocumentation
 */

export {
  inspectSource,
  inspectFile,
  classifyFunction,
  type ReturnStyle,
  type FunctionReport,
  type InspectOptions,
} from "./inspect.js";
