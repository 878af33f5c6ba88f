import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';

/** zod 校验请求输入，失败转 400 */
export function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
): T {
  const r = schema.safeParse(value);
  if (!r.success) {
    throw new BadRequestException(
      r.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`),
    );
  }
  return r.data;
}
