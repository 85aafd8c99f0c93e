export * from './hash-verifier';
