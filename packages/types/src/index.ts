export * from './rfq';
