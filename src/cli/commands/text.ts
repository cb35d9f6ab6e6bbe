import { readFileSync } from 'node:fs';
import { textToBrainfuck } from '../../text/text-to-bf.js';

export interface TextOptions {
  /** 把参数本身当作文本，而不是文件路径 */
  literal?: boolean;
}

/**
 * 输出一个打印给定文本的程序。
 */
export function textCommand(
  input: string,
  options: TextOptions,
  write: (text: string) => void = text => {
    process.stdout.write(text);
  },
): string {
  const text = options.literal ? input : readFileSync(input, 'utf8');
  const program = textToBrainfuck(text);
  write(`${program}\n`);
  return program;
}
