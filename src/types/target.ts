/** Hardware vendors the router knows how to drive. Anything else resolves to "Unknown". */
export type Manufacturer = "Dell" | "Supermicro" | "Unknown";

/**
 * A machine resolved from inventory. Created once per invocation and never mutated.
 */
export interface Target {
  readonly hostname: string;
  readonly managementAddress: string;
  readonly manufacturer: Manufacturer;
}
