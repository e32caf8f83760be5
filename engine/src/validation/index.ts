export * from './StructuralValidator.js';
