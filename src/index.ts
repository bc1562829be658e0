export * from './BareIncludeNormalizer';
export * from './BodyDecoder';
export * from './ConfigDecoder';
export * from './ConfigEvaluator';
export * from './DependencyResolver';
export * from './DocumentParser';
export * from './errors';
export * from './EvalContext';
export * from './ExpressionEvaluator';
export * from './functions';
export * from './FunctionsRegistry';
export * from './logger';
export * from './model';
export * from './ParsedDocument';
export * from './Schema';
export * from './tf/model';
export * from './tf/StateManager';
export * from './ValueBridge';
export * from './values/convert';
export * from './values/json';
export * from './values/types';
export * from './values/values';
