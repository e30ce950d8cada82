// Shared error taxonomy
export * from './errors';
