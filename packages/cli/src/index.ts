export { buildRequest, createTrimfitService, run } from './main.js';
export type { CliIO, CreateNormalizer, Normalizer } from './main.js';
export { parseCliArgs } from './args.js';
export type { CliArgs } from './args.js';
export { NodeFileSystem } from './node-file-system.js';
export { usage, VERSION } from './help.js';
