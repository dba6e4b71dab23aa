export interface Config {
  apiBaseUrl: string;
  timeoutMs: number;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const apiBaseUrl = env.TXDOCS_API_URL;
  if (!apiBaseUrl) {
    throw new Error('TXDOCS_API_URL is not set. Point it at the document API, e.g. https://api.example.com/prod');
  }

  const timeoutMs = env.TXDOCS_TIMEOUT_MS ? Number(env.TXDOCS_TIMEOUT_MS) : 60000;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new Error('TXDOCS_TIMEOUT_MS must be a positive integer');
  }

  return {
    apiBaseUrl: apiBaseUrl.replace(/\/+$/, ''),
    timeoutMs
  };
}
