export { PdfjamLayoutTool, PDFJAM_INSTALL_HINT, formatPaperSize } from './pdfjam-layout-tool.js';
export type { PdfjamOptions } from './pdfjam-layout-tool.js';
export { ChildProcessRunner } from './child-process-runner.js';
export { locateExecutable } from './locate-executable.js';
export type { LocateExecutableFn, LocateOptions } from './locate-executable.js';
