export * from './telegram.schema';
export * from './entity-normaliser';
export * from './message.factory';
export * from './telegram.parser';
