export { renderJson, toMatchDocument } from './json.js';
export { renderCsv, renderPointsCsv, renderSetsCsv, renderTotalsCsv } from './csv.js';
export type { CsvTable } from './csv.js';
export { renderText } from './text.js';
export { describeEvent, exportBaseName, safePercent } from './format.js';
