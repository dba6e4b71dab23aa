/**
 * Simple service container for dependency injection
 */

type ServiceFactory<T> = (container: ServiceContainer) => T;
type ServiceLifetime = 'singleton' | 'transient';

interface ServiceRegistration {
  factory: ServiceFactory<unknown>;
  lifetime: ServiceLifetime;
  instance?: unknown;
}

export class ServiceContainer {
  private services = new Map<string, ServiceRegistration>();

  register<T>(
    token: string,
    factory: ServiceFactory<T>,
    lifetime: ServiceLifetime = 'singleton'
  ): void {
    this.services.set(token, { factory, lifetime });
  }

  resolve<T>(token: string): T {
    const registration = this.services.get(token);
    if (!registration) {
      throw new Error(`Service '${token}' not registered`);
    }

    // Return singleton instance if already created
    if (registration.lifetime === 'singleton' && registration.instance !== undefined) {
      return registration.instance as T;
    }

    const instance = registration.factory(this);

    if (registration.lifetime === 'singleton') {
      registration.instance = instance;
    }

    return instance as T;
  }

  isRegistered(token: string): boolean {
    return this.services.has(token);
  }

  /**
   * Clear all registrations (useful for testing)
   */
  clear(): void {
    this.services.clear();
  }
}

// Service tokens (string constants to avoid typos)
export const ServiceTokens = {
  CONFIG: 'AppConfig',
  OBJECT_STORE: 'IObjectStore',
  ERROR_HANDLER: 'IErrorHandler'
} as const;
