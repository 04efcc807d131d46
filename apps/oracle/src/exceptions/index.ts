export * from './oracle.exception';
