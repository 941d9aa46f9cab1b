export const NAME = 'lanrelay';
export const VERSION = '0.3.0';
