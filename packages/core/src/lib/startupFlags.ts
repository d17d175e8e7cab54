import { isTruthyFlag } from '../config/settings.js';

export interface StartupFlags {
  debug: boolean;
}

const startupFlags: StartupFlags = {
  debug: isTruthyFlag(process.env.BESSIE_DEBUG),
};

export function getStartupFlags(): StartupFlags {
  return { ...startupFlags };
}

export function getDebugFlag(): boolean {
  return startupFlags.debug;
}

export interface StartupFlagOverrides {
  debug?: unknown;
}

export function setStartupFlags(nextFlags: StartupFlagOverrides = {}): StartupFlags {
  if (!nextFlags || typeof nextFlags !== 'object') {
    return getStartupFlags();
  }

  if (Object.prototype.hasOwnProperty.call(nextFlags, 'debug')) {
    startupFlags.debug = Boolean(nextFlags.debug);
  }

  return getStartupFlags();
}
