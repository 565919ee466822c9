export * from './BaseLink';
export * from './LocalLink';
export * from './NetworkLink';
export * from './MockLink';
export * from './LinkFactory';
