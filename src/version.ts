// src/version.ts

export const VERSION = '1.0.0';
