export * from './SubnetConfig';
export * from './SubnetFactory';
