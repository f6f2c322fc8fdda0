export * from './types';
export * from './errors';
export * from './random';
export * from './geometry';
export * from './layout';
export * from './assemble';
export * from './renderer';
export * from './animate';
export * from './prompts';
export * from './config';
export * from './exportGif';
export * from './generator';
