/**
 * Built-in workshop profiles
 *
 * Each workshop stage ships the same setup flow with small differences in
 * how a new project is created, how hard a failed install is, and what gets
 * cleaned up beforehand. Those differences live here as data.
 */

export type RetryMode = 'auto' | 'interactive';

export interface RetryPolicy {
  /** auto: keep generating IDs; interactive: ask the user each round */
  mode: RetryMode;
  /** Fallback rounds after the first creation attempt; unset means unbounded */
  maxAttempts?: number;
}

export interface InstallStep {
  /** argv of the install command; empty skips the step */
  command: string[];
  /** Directory to run in; defaults to the labkit package root */
  cwd?: string;
  fatal: boolean;
  failureMessage: string;
}

export interface BillingHelperStep {
  /** argv of the helper; empty runs labkit's own enable-billing command */
  command: string[];
  failureMessage: string;
}

export interface WorkshopProfile {
  name: string;
  projectPrefix: string;
  projectFile: string;
  labels: Record<string, string>;
  cleanupPaths: string[];
  clearUvCache: boolean;
  retry: RetryPolicy;
  install: InstallStep;
  billingHelper: BillingHelperStep;
  banner?: string;
}

/** Same major as the billing gateway is written against */
export const BILLING_CLIENT_PACKAGE = '@google-cloud/billing@^4';

export const DEFAULT_PROJECT_FILE = '~/project_id.txt';

const LAB_DIRECTORIES = [
  '~/prai-roadshow-lab-1-starter',
  '~/agent-evaluation-lab',
  '~/prai-roadshow-lab-3-starter',
];

export const DAY_ONE: WorkshopProfile = {
  name: 'day-one',
  projectPrefix: 'production-ready-ai',
  projectFile: DEFAULT_PROJECT_FILE,
  labels: {},
  cleanupPaths: LAB_DIRECTORIES,
  clearUvCache: false,
  retry: { mode: 'auto' },
  install: {
    command: ['npm', 'install', '--no-save', '--no-audit', '--no-fund', BILLING_CLIENT_PACKAGE],
    fatal: true,
    failureMessage: 'Failed to install the billing client library.',
  },
  billingHelper: {
    command: [],
    failureMessage: 'The billing enablement script failed. See the output above for details.',
  },
};

export const DAY_TWO: WorkshopProfile = {
  name: 'day-two',
  projectPrefix: 'waybackhome',
  projectFile: DEFAULT_PROJECT_FILE,
  labels: { environment: 'development' },
  cleanupPaths: LAB_DIRECTORIES,
  clearUvCache: true,
  retry: { mode: 'interactive' },
  install: {
    command: ['npm', 'install', '--no-save', '--silent', BILLING_CLIENT_PACKAGE],
    fatal: false,
    failureMessage: 'Could not install the billing client library.',
  },
  billingHelper: {
    command: [],
    failureMessage: 'Billing setup incomplete. Please configure billing and try again.',
  },
  banner: '🚀 Welcome to Way Back Home!',
};

export const PROFILES: Record<string, WorkshopProfile> = {
  [DAY_ONE.name]: DAY_ONE,
  [DAY_TWO.name]: DAY_TWO,
};

export const PROFILE_NAMES = Object.keys(PROFILES);

export function getProfile(name: string): WorkshopProfile | undefined {
  return PROFILES[name];
}
