export { buildScanSpec, SCAN_UNIT } from './builder.js';
export type { ScanSpec, ScanSpecOptions } from './builder.js';
export { DirectoryScanner, loadComponentMeta } from './scanner.js';
export type { ComponentScanner, ScannedComponent } from './scanner.js';
export { tokenizePackages, resolvePlaceholders } from './packages.js';
