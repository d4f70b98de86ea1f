export const NAME = 'uplift';
export const VERSION = '0.1.0';
