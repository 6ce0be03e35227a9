/**
 * Transform module exports
 */

export { applySignature, functionOf, isFunctionValue } from './signature.js';
export { parseTypeAnnotation } from './annotation.js';
export { enclose, isMemberDeclaration } from './enclosure.js';
