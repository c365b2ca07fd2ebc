export * from './types/index.js';
export * from './config/index.js';
export * from './utils/index.js';
export * from './core/index.js';
export * from './infra/index.js';
export * from './render/text-report.js';

import { analyzeInterfaceText } from './core/error-analyzer.js';

export default analyzeInterfaceText;
