export * from './signature-verifier';
export * from './return-token';
