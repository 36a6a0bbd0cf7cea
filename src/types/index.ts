export * from './message.types';
export * from './query.types';
