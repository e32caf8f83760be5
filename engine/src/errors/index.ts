export * from './ErrorCodes.js';
export * from './FlowError.js';
export * from './ErrorFormatter.js';
export * from './TypoDetector.js';
