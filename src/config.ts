import 'dotenv/config';

const flag = (value: string | undefined): boolean =>
  value !== undefined && /^(1|true|yes|on)$/i.test(value.trim());

export interface AppConfig {
  continueOnError: boolean;
  verbose: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    continueOnError: flag(env.WORKOUT_CONTINUE_ON_ERROR),
    verbose: flag(env.WORKOUT_VERBOSE)
  };
}

export const CONFIG = loadConfig();
