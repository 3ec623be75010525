/**
 * ArgumentSchema: declarative description of the flags a chat command
 * accepts.
 *
 * Flags are keyed by their bare name (`fresh`, `p`). The same entry is
 * matched by `-p` and `--fresh`; which form carries meaning depends on the
 * declared type:
 *
 *   boolean + bit           option, set by `--name`, packed into the bitmask
 *   integer | float | text  valued flag, bound by `-name <value>`
 */

export type ArgumentType = 'integer' | 'float' | 'boolean' | 'text';

export interface FlagSpec {
  type: ArgumentType;
  /** Bit position in the options mask. Boolean flags only. */
  bit?: number;
  required: boolean;
  description?: string;
}

export interface ArgumentSchema {
  readonly flags: ReadonlyMap<string, FlagSpec>;
}

const MAX_BIT = 31;

/**
 * Build a schema from an ordered record of flag specs.
 * Throws when two flags share a bit, a bit is out of range, or a
 * non-boolean flag claims a bit.
 */
export function defineSchema(flags: Record<string, FlagSpec>): ArgumentSchema {
  const entries = new Map<string, FlagSpec>();
  const bitOwners = new Map<number, string>();

  for (const [name, spec] of Object.entries(flags)) {
    if (spec.bit !== undefined) {
      if (spec.type !== 'boolean') {
        throw new Error(`Flag "${name}" has bit ${spec.bit} but is ${spec.type}-typed; only boolean flags carry bits`);
      }
      if (!Number.isInteger(spec.bit) || spec.bit < 0 || spec.bit > MAX_BIT) {
        throw new Error(`Flag "${name}" bit ${spec.bit} is outside 0..${MAX_BIT}`);
      }
      const owner = bitOwners.get(spec.bit);
      if (owner !== undefined) {
        throw new Error(`Flags "${owner}" and "${name}" both claim bit ${spec.bit}`);
      }
      bitOwners.set(spec.bit, name);
    }
    entries.set(name, spec);
  }

  return { flags: entries };
}

export function lookupFlag(schema: ArgumentSchema, name: string): FlagSpec | undefined {
  return schema.flags.get(name);
}

/** Bit mask for a boolean flag, or 0 when the flag has no bit. */
export function optionMask(schema: ArgumentSchema, name: string): number {
  const spec = schema.flags.get(name);
  if (spec?.bit === undefined) return 0;
  return (1 << spec.bit) >>> 0;
}

export function hasOption(options: number, schema: ArgumentSchema, name: string): boolean {
  const mask = optionMask(schema, name);
  return mask !== 0 && (options & mask) >>> 0 === mask;
}
