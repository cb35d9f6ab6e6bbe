import { OpKind } from '../../types.js';
import { GENERATED_BANNER, sanitizeProgramName, type CodegenTarget } from './target.js';

// 静态链接 C 运行时，生成的可执行文件可以直接分发
const STATIC_CRT_PLATFORMS = [
  'aarch64-unknown-linux-gnu',
  'i686-pc-windows-gnu',
  'i686-pc-windows-msvc',
  'i686-unknown-linux-gnu',
  'x86_64-apple-darwin',
  'x86_64-pc-windows-gnu',
  'x86_64-pc-windows-msvc',
  'x86_64-unknown-linux-gnu',
];

function cargoToml(name: string): string {
  return [
    '[package]',
    `name = "${name}"`,
    'version = "0.1.0"',
    'edition = "2021"',
    '',
    '[dependencies]',
    '',
  ].join('\n');
}

function cargoConfig(): string {
  return STATIC_CRT_PLATFORMS.map(
    platform => `[target.${platform}]\nrustflags = ["-C", "target-feature=+crt-static"]\n`
  ).join('\n');
}

export const rustTarget: CodegenTarget = {
  name: 'rust',
  mainFile: 'src/main.rs',
  indentUnit: '    ',
  bodyDepth: 1,
  statements: {
    [OpKind.MoveRight]: 'ptr += 1; if ptr == tape.len() { tape.push(0); }',
    [OpKind.MoveLeft]: 'if ptr == 0 { underflow(&mut out); } ptr -= 1;',
    [OpKind.Increment]: 'tape[ptr] = tape[ptr].wrapping_add(1);',
    [OpKind.Decrement]: 'tape[ptr] = tape[ptr].wrapping_sub(1);',
    [OpKind.Output]: 'out.write_all(&[tape[ptr]]).expect("error writing output");',
    [OpKind.Input]: 'read_cell(&mut input, &mut out, &mut tape[ptr]);',
  },
  loopOpen: 'while tape[ptr] != 0 {',
  loopClose: '}',
  preamble: [
    `// ${GENERATED_BANNER}`,
    '#![allow(unused_mut, unused_variables, unused_imports, dead_code)]',
    '',
    'use std::io::{self, BufWriter, Read, Write};',
    'use std::process;',
    '',
    'fn underflow(out: &mut impl Write) -> ! {',
    '    let _ = out.flush();',
    '    eprintln!("error: data pointer moved left of cell 0");',
    '    process::exit(1);',
    '}',
    '',
    'fn read_cell(input: &mut impl Read, out: &mut impl Write, cell: &mut u8) {',
    '    out.flush().expect("error flushing output");',
    '    let mut buf = [0u8; 1];',
    '    loop {',
    '        match input.read(&mut buf) {',
    '            Ok(0) => return,',
    '            Ok(_) => {',
    '                *cell = buf[0];',
    '                return;',
    '            }',
    '            Err(err) if err.kind() == io::ErrorKind::Interrupted => continue,',
    '            Err(err) => panic!("error reading input: {}", err),',
    '        }',
    '    }',
    '}',
    '',
    'fn main() {',
    '    let stdin = io::stdin();',
    '    let mut input = stdin.lock();',
    '    let stdout = io::stdout();',
    '    let mut out = BufWriter::new(stdout.lock());',
    '    let mut tape: Vec<u8> = vec![0];',
    '    let mut ptr: usize = 0;',
    '',
  ],
  epilogue: ['', '    out.flush().expect("error flushing output");', '}'],
  projectFiles(name, mainSource) {
    const crate = sanitizeProgramName(name);
    return [
      { path: 'Cargo.toml', contents: cargoToml(crate) },
      { path: '.cargo/config.toml', contents: cargoConfig() },
      { path: 'src/main.rs', contents: mainSource },
    ];
  },
  buildCommand(name) {
    return {
      command: 'cargo',
      args: ['build', '--release'],
      artifact: `target/release/${sanitizeProgramName(name)}`,
    };
  },
};
