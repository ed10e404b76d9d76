export const PROVENANT_VERSION = '0.1.0';
