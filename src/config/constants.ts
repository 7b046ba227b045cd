export const ENV_KEYS = {
  SUPABASE_URL: 'SUPABASE_URL',
  SUPABASE_ANON_KEY: 'SUPABASE_ANON_KEY',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

export const DEFAULT_ENV_FILE = '.env';

// Example values from the setup instructions. A real credential never starts with these.
export const PLACEHOLDER_PREFIXES = [
  'your-',
  'your_',
  'tu-',
  'tu_',
  '<',
  'changeme',
] as const;

export const PLACEHOLDER_HOSTS = ['your-project', 'tu-proyecto'] as const;

export const UNSUPPORTED_KEY_PREFIXES = ['sb_publishable_', 'sb_secret_'] as const;

export const TABLES = {
  HABITS: 'habits',
  REMINDERS: 'reminders',
} as const;

export const COLUMNS = {
  HABITS: 'id,name,streak,total_done,last_done_date,created_at',
  REMINDERS: 'id,title,due_date,created_at',
} as const;

export const CONFIG_ERRORS = {
  MISSING_SECRET: (keys: string[]) => `Missing environment variables: ${keys.join(' and ')}.`,
  INVALID_URL: `${ENV_KEYS.SUPABASE_URL} must be an absolute http(s) URL.`,
  UNSUPPORTED_KEY: `${ENV_KEYS.SUPABASE_ANON_KEY} must be the legacy anon key (a JWT starting with "eyJ"), not a publishable or secret key.`,
  INVALID_KEY: `${ENV_KEYS.SUPABASE_ANON_KEY} is not a JWT-style anon key.`,
} as const;

export const AUTH_ERRORS = {
  WEAK_CREDENTIAL: 'Password is too weak',
  ALREADY_REGISTERED: 'An account with this email already exists',
  INVALID_CREDENTIALS: 'Invalid credentials',
  EMAIL_NOT_CONFIRMED: 'Email address has not been confirmed yet',
  NOT_AUTHENTICATED: 'User is not authenticated',
  UNAVAILABLE: 'Authentication service is unavailable',
  REJECTED: 'Authentication request was rejected',
} as const;

export const DATA_ERRORS = {
  UNAUTHORIZED: 'Not allowed to access these rows',
  NOT_FOUND: 'No matching rows',
  TRANSIENT: 'Data service is unavailable, try again',
  INVALID_REQUEST: 'Updates and deletes need at least one filter',
  REJECTED: 'Data request was rejected',
} as const;

export const SETUP_STEPS = [
  'Create a project in Supabase.',
  'Run the SQL in supabase/schema.sql.',
  `Define ${ENV_KEYS.SUPABASE_URL} and ${ENV_KEYS.SUPABASE_ANON_KEY} (environment or .env).`,
  'Restart the app.',
] as const;

export const MESSAGES = {
  AUTH: {
    SIGNED_UP_ACTIVE: 'Account created.',
    SIGNED_UP_PENDING: 'Account created. Check your email to confirm it before signing in.',
    SIGNED_IN: (email: string) => `Signed in as ${email}.`,
    SIGNED_OUT: 'Signed out.',
    SIGN_IN_FIRST: 'Sign in first.',
  },
  HABIT: {
    ADDED: 'Habit added.',
    COMPLETED: 'Habit completed for today.',
    ALREADY_DONE: 'Already completed today.',
    DELETED: 'Habit deleted.',
    EMPTY: 'No habits yet.',
  },
  REMINDER: {
    ADDED: 'Reminder added.',
    DELETED: 'Reminder deleted.',
    EMPTY: 'No reminders yet.',
  },
  GENERIC_FAILURE: 'Operation failed.',
} as const;
