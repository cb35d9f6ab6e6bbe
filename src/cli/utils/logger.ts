/**
 * 面向终端用户的带颜色消息输出。
 *
 * 结构化日志走 utils/logger.ts；这里只负责人读的提示行。
 * 程序自身的输出占用 stdout，因此除 info / success 外都写到 stderr。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Dim = '\u001B[2m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Cyan = '\u001B[36m',
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function info(message: string): void {
  console.log(colorize('ℹ', message, AnsiColor.Cyan));
}

export function success(message: string): void {
  console.log(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}

/** 诊断的附加说明行（源码摘录、related 信息） */
export function note(message: string): void {
  console.error(`${AnsiColor.Dim}${message}${AnsiColor.Reset}`);
}
