import { defineSchema, type ArgumentSchema } from '../args/schema.js';

/**
 * Flags accepted by the `start` chat command. The first positional, if any,
 * is the world seed.
 */
export const START_SCHEMA: ArgumentSchema = defineSchema({
  fresh: { type: 'boolean', bit: 0, required: false, description: 'start a new throwaway world instead of resuming' },
  quiet: { type: 'boolean', bit: 1, required: false, description: 'short reply without the banner' },
  p: { type: 'integer', required: false, description: 'published host port (fresh worlds only)' },
  g: { type: 'float', required: false, description: 'memory limit in GiB (fresh worlds only)' },
  d: { type: 'text', required: false, description: 'difficulty, e.g. peaceful or hard (fresh worlds only)' },
});

export function describeSchema(schema: ArgumentSchema): string[] {
  const lines: string[] = [];
  for (const [name, spec] of schema.flags) {
    const usage = spec.type === 'boolean' ? `--${name}` : `-${name} <${spec.type}>`;
    lines.push(spec.description ? `${usage}  ${spec.description}` : usage);
  }
  return lines;
}
