export * from './transaction.schema';
export * from './request.schema';
