import { OpKind } from '../../types.js';
import { GENERATED_BANNER, sanitizeProgramName, type CodegenTarget } from './target.js';

export const cTarget: CodegenTarget = {
  name: 'c',
  mainFile: 'main.c',
  indentUnit: '    ',
  bodyDepth: 1,
  statements: {
    [OpKind.MoveRight]: 'move_right();',
    [OpKind.MoveLeft]: 'move_left();',
    [OpKind.Increment]: 'tape[ptr]++;',
    [OpKind.Decrement]: 'tape[ptr]--;',
    [OpKind.Output]: 'putchar(tape[ptr]);',
    [OpKind.Input]: 'read_cell();',
  },
  loopOpen: 'while (tape[ptr] != 0) {',
  loopClose: '}',
  preamble: [
    `/* ${GENERATED_BANNER} */`,
    '#include <stdio.h>',
    '#include <stdlib.h>',
    '#include <string.h>',
    '',
    'static unsigned char *tape;',
    'static size_t tape_len = 1;',
    'static size_t tape_cap = 1024;',
    'static size_t ptr = 0;',
    '',
    'static void fail(const char *message) {',
    '    fflush(stdout);',
    '    fprintf(stderr, "error: %s\\n", message);',
    '    exit(1);',
    '}',
    '',
    'static void move_right(void) {',
    '    ptr++;',
    '    if (ptr == tape_len) {',
    '        if (tape_len == tape_cap) {',
    '            unsigned char *grown = realloc(tape, tape_cap * 2);',
    '            if (grown == NULL) {',
    '                fail("out of memory growing the tape");',
    '            }',
    '            memset(grown + tape_cap, 0, tape_cap);',
    '            tape = grown;',
    '            tape_cap *= 2;',
    '        }',
    '        tape_len++;',
    '    }',
    '}',
    '',
    'static void move_left(void) {',
    '    if (ptr == 0) {',
    '        fail("data pointer moved left of cell 0");',
    '    }',
    '    ptr--;',
    '}',
    '',
    'static void read_cell(void) {',
    '    int c;',
    '    fflush(stdout);',
    '    c = getchar();',
    '    if (c != EOF) {',
    '        tape[ptr] = (unsigned char)c;',
    '    }',
    '}',
    '',
    'int main(void) {',
    '    tape = calloc(tape_cap, 1);',
    '    if (tape == NULL) {',
    '        fail("out of memory allocating the tape");',
    '    }',
    '',
  ],
  epilogue: ['', '    fflush(stdout);', '    free(tape);', '    return 0;', '}'],
  projectFiles(_name, mainSource) {
    return [{ path: 'main.c', contents: mainSource }];
  },
  buildCommand(name) {
    const artifact = sanitizeProgramName(name);
    return { command: 'cc', args: ['-O2', '-o', artifact, 'main.c'], artifact };
  },
};
