// packages/resolver/src/index.ts
export * from './join-path';
export * from './elevation';
export * from './interpretations';
