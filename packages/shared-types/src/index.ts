export * from './catalog';
export * from './matching';
export * from './sources';
export * from './summary';
