import { registerAs } from '@nestjs/config';

export interface MaptilerConfig {
  apiKey: string;
}

export const maptilerConfig = registerAs('maptiler', (): MaptilerConfig => ({
  apiKey: process.env.MAPTILER_KEY || '',
}));
