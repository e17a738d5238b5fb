import { z } from 'zod';
import { PathParseError } from '../errors/DomainErrors.js';
import { MAX_PATH_ELEMENT } from './PathOffset.js';
import type { PathVector } from './PathElement.js';

/** 文字形式的分隔符號，例如 "3.12.5" */
export const PATH_SEPARATOR = '.';

const componentSchema = z
  .string()
  .min(1, 'empty component')
  .regex(/^[0-9]+$/, 'not a non-negative decimal integer');

/**
 * 解析點分隔的路徑文字
 *
 * - 空字串 → root（空向量）
 * - 允許前導零，"007" 與 "7" 相同
 * - 空 component（前後或連續的 "."）、非數字、超過 64-bit 範圍皆為 PathParseError
 */
export function parsePathText(text: string): bigint[] {
  if (text === '') return [];

  return text.split(PATH_SEPARATOR).map((component, index) => {
    const checked = componentSchema.safeParse(component);
    if (!checked.success) {
      const reason = checked.error.issues[0]?.message ?? 'invalid component';
      throw new PathParseError(component, index, reason, { cause: checked.error });
    }

    const value = BigInt(checked.data);
    if (value > MAX_PATH_ELEMENT) {
      throw new PathParseError(component, index, `exceeds maximum element ${MAX_PATH_ELEMENT}`);
    }
    return value;
  });
}

/** 路徑向量 → 正規化文字（無前導零） */
export function formatPathText(vector: PathVector): string {
  return vector.map((element) => element.toString()).join(PATH_SEPARATOR);
}
