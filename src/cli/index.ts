export { createProgram } from './program.js';
export { formatOutput, formatJson, formatTable, isOutputFormat, OUTPUT_FORMATS } from './output/index.js';
export type { OutputFormat } from './output/index.js';
