export * from './rfq.zod';
export * from './requests.zod';
