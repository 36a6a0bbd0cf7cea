export * from './constants';
export * from './errors';
export * from './file.utils';
export * from './message.utils';
