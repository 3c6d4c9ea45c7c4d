// src/version.ts

export const VERSION = "0.1.0";
