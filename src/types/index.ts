export * from './reference';
export * from './parsing';
export * from './settings';
export * from './verification';
