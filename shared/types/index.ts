export * from './measurement';
export * from './web';
