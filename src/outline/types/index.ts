export * from './outline.types';
