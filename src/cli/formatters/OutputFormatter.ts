import type { OutputFormat } from '../../config/types.js';
import type { PathDescription } from '../../application/dto/PathDescription.js';

export type { OutputFormat } from '../../config/types.js';

/** root 在文字輸出中的顯示方式 */
const ROOT_LABEL = '(root)';

/** 解析 --format 選項；未指定時使用設定值 */
export function resolveFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  if (value === undefined) return fallback;
  if (value === 'json' || value === 'text') return value;
  throw new Error(`Unknown output format "${value}". Use json or text.`);
}

/**
 * 輸出格式化器
 *
 * - json：縮排 2 的 JSON
 * - text：人類可讀的 key: value 行
 */
export class OutputFormatter {
  formatPath(description: PathDescription, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(description, null, 2);
    }

    return [
      `path:     ${description.text === '' ? ROOT_LABEL : description.text}`,
      `vector:   [${description.vector.join(', ')}]`,
      `depth:    ${description.depth}`,
      `parent:   ${description.parent === null ? '-' : description.parent === '' ? ROOT_LABEL : description.parent}`,
      `rational: ${description.rational}`,
      `matrix:   (${description.matrix.join(', ')})`,
    ].join('\n');
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      if (data.length === 0) return `${prefix}(none)`;
      return data.map((item, i) => `${prefix}[${i}]\n${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${val === '' ? ROOT_LABEL : String(val)}`;
      })
      .join('\n');
  }
}
