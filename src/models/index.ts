export { LogisticModel, SoftmaxModel, sigmoid, softmax } from './linear-models.js';
export { ModelFormatRegistry, schemaDecoder } from './format-registry.js';
export type { DecodeContext, ModelDecoder } from './format-registry.js';
