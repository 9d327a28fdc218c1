import { describe, expect, it } from 'vitest';
import { createEnum } from './create-enum.js';

describe('createEnum', () => {
  const color = createEnum(['red', 'green'] as const);

  it('should expose uppercase keys mapping to the values', () => {
    expect(color.object.RED).toBe('red');
    expect(color.object.GREEN).toBe('green');
    expect(color.values).toEqual(['red', 'green']);
  });

  it('should build a zod schema accepting only the values', () => {
    expect(color.schema.safeParse('green').success).toBe(true);
    expect(color.schema.safeParse('blue').success).toBe(false);
  });
});
