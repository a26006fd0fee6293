export * from './types';
export * from './core/constants';
export * from './core/coords';
export * from './core/color';
export * from './core/block';
export * from './core/layout';
export * from './core/chains';
export * from './core/frameCache';
export * from './core/resize';
export * from './core/session';
export * from './services/decodeQueue';
export * from './state/store';
export * from './react/useEngineTick';
