import { OpKind } from '../../types.js';
import { GENERATED_BANNER, type CodegenTarget } from './target.js';

/**
 * Node.js 脚本目标。
 *
 * 输出为 CommonJS（`main.cjs`），在任何 `"type"` 设置下都可以用 `node main.cjs` 直接运行。
 */
export const javascriptTarget: CodegenTarget = {
  name: 'javascript',
  mainFile: 'main.cjs',
  indentUnit: '  ',
  bodyDepth: 1,
  statements: {
    [OpKind.MoveRight]: 'moveRight();',
    [OpKind.MoveLeft]: 'moveLeft();',
    [OpKind.Increment]: 'tape[ptr] = (tape[ptr] + 1) & 255;',
    [OpKind.Decrement]: 'tape[ptr] = (tape[ptr] - 1) & 255;',
    [OpKind.Output]: 'output();',
    [OpKind.Input]: 'input();',
  },
  loopOpen: 'while (tape[ptr] !== 0) {',
  loopClose: '}',
  preamble: [
    `// ${GENERATED_BANNER}`,
    "'use strict';",
    '',
    "const fs = require('node:fs');",
    '',
    'let tape = new Uint8Array(1024);',
    'let tapeLength = 1;',
    'let ptr = 0;',
    'const outBuffer = new Uint8Array(4096);',
    'let outLength = 0;',
    'const inBuffer = new Uint8Array(1);',
    'let inputEnded = false;',
    '',
    'function flush() {',
    '  let offset = 0;',
    '  while (offset < outLength) {',
    '    offset += fs.writeSync(1, outBuffer, offset, outLength - offset);',
    '  }',
    '  outLength = 0;',
    '}',
    '',
    'function moveRight() {',
    '  ptr++;',
    '  if (ptr === tapeLength) {',
    '    if (tapeLength === tape.length) {',
    '      const grown = new Uint8Array(tape.length * 2);',
    '      grown.set(tape);',
    '      tape = grown;',
    '    }',
    '    tapeLength++;',
    '  }',
    '}',
    '',
    'function moveLeft() {',
    '  if (ptr === 0) {',
    '    flush();',
    "    fs.writeSync(2, 'error: data pointer moved left of cell 0\\n');",
    '    process.exit(1);',
    '  }',
    '  ptr--;',
    '}',
    '',
    'function output() {',
    '  outBuffer[outLength++] = tape[ptr];',
    '  if (outLength === outBuffer.length) {',
    '    flush();',
    '  }',
    '}',
    '',
    'function input() {',
    '  if (inputEnded) {',
    '    return;',
    '  }',
    '  flush();',
    '  for (;;) {',
    '    let count;',
    '    try {',
    '      count = fs.readSync(0, inBuffer, 0, 1, null);',
    '    } catch (err) {',
    "      if (err.code === 'EAGAIN') {",
    '        continue;',
    '      }',
    "      if (err.code !== 'EOF') {",
    '        throw err;',
    '      }',
    '      count = 0;',
    '    }',
    '    if (count === 0) {',
    '      inputEnded = true;',
    '      return;',
    '    }',
    '    tape[ptr] = inBuffer[0];',
    '    return;',
    '  }',
    '}',
    '',
    'function main() {',
  ],
  epilogue: ['}', '', 'main();', 'flush();'],
  projectFiles(_name, mainSource) {
    return [{ path: 'main.cjs', contents: mainSource }];
  },
  buildCommand() {
    return null;
  },
};
