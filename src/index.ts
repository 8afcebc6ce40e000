export * from './physics';
export * from './core/units';
