export interface RuntimePreflightOptions {
  allowNonProd?: boolean;
  allowMemoryInProduction?: boolean;
}

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

export function shouldRunRuntimePreflight(env: NodeJS.ProcessEnv): boolean {
  return env.ENABLE_RUNTIME_PREFLIGHT === '1' || env.NODE_ENV === 'production';
}

export function validateRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): string[] {
  const errors: string[] = [];
  const allowNonProd = options.allowNonProd ?? false;
  const allowMemoryInProduction = options.allowMemoryInProduction ?? false;

  const nodeEnv = env.NODE_ENV?.trim();
  if (isBlank(nodeEnv)) {
    errors.push('NODE_ENV is not set');
  } else if (nodeEnv !== 'production' && !allowNonProd) {
    errors.push(`NODE_ENV=${nodeEnv} is not production (set ALLOW_NON_PROD=1 to skip)`);
  }

  const localDriver = env.LOCAL_STORE_DRIVER?.trim() || 'sqlite';
  if (localDriver !== 'sqlite' && localDriver !== 'memory') {
    errors.push(`LOCAL_STORE_DRIVER=${localDriver} is invalid, expected sqlite or memory`);
  }
  if (localDriver === 'memory' && nodeEnv === 'production' && !allowMemoryInProduction) {
    errors.push(
      'memory local store loses entries on restart (set ALLOW_MEMORY_IN_PRODUCTION=1 to skip)'
    );
  }

  const remoteDriver = env.REMOTE_DRIVER?.trim() || 'supabase';
  if (remoteDriver === 'supabase' || remoteDriver === 'postgres') {
    // Sign-in goes through Supabase Auth with either table backend.
    const url = env.SUPABASE_URL?.trim();
    if (!url) {
      errors.push(`SUPABASE_URL is required when REMOTE_DRIVER=${remoteDriver}`);
    } else if (!/^https?:\/\//.test(url)) {
      errors.push('SUPABASE_URL must start with http:// or https://');
    }
    if (isBlank(env.SUPABASE_ANON_KEY)) {
      errors.push(`SUPABASE_ANON_KEY is required when REMOTE_DRIVER=${remoteDriver}`);
    }
  }
  if (remoteDriver === 'postgres') {
    const databaseUrl = env.DATABASE_URL?.trim();
    if (!databaseUrl) {
      errors.push('DATABASE_URL is required when REMOTE_DRIVER=postgres');
    } else if (!/^postgres(ql)?:\/\//.test(databaseUrl)) {
      errors.push('DATABASE_URL must start with postgres:// or postgresql://');
    }
  } else if (remoteDriver === 'memory') {
    if (nodeEnv === 'production' && !allowMemoryInProduction) {
      errors.push(
        'memory remote store is for development only (set ALLOW_MEMORY_IN_PRODUCTION=1 to skip)'
      );
    }
  } else if (remoteDriver !== 'supabase') {
    errors.push(`REMOTE_DRIVER=${remoteDriver} is invalid, expected supabase, postgres or memory`);
  }

  const port = (env.PORT ?? '3000').trim();
  if (!/^\d+$/.test(port)) {
    errors.push(`PORT=${port} is invalid, must be numeric`);
  } else {
    const value = Number(port);
    if (value < 1 || value > 65535) {
      errors.push(`PORT=${port} is out of range 1-65535`);
    }
  }

  return errors;
}

/** Missing analysis credentials only disable analysis, so they are reported separately. */
export function runtimeWarnings(env: NodeJS.ProcessEnv): string[] {
  return isBlank(env.OPENAI_API_KEY)
    ? ['OPENAI_API_KEY is not set; journal analysis is disabled']
    : [];
}

export function assertRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): void {
  const errors = validateRuntimeEnv(env, options);
  if (errors.length === 0) {
    return;
  }

  const message = ['Runtime environment check failed:', ...errors.map((item) => `- ${item}`)].join(
    '\n'
  );
  throw new Error(message);
}
