export * from './word-count.computer';
export * from './word-grep.computer';
export * from './message-count.computer';
