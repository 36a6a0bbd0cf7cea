export * from './command-parser';
export * from './commands';
export * from './interactive';
export * from './main';
