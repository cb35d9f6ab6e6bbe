export { transpile, type GeneratedSource } from './transpiler.js';
export { emit, emitProject, type EmittedProject } from './emitter.js';
export {
  getTarget,
  rustTarget,
  cTarget,
  javascriptTarget,
  sanitizeProgramName,
  GENERATED_BANNER,
  type CodegenTarget,
  type StatementOp,
  type ProjectFile,
  type BuildCommand,
} from './targets/index.js';
