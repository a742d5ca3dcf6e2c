import { loadConfig } from '@shared/config';

export const config = loadConfig();
