/**
 * Simple Dependency Injection Container
 * Manages service lifecycles and dependencies
 */

export type ServiceFactory<T> = () => T;

/**
 * Service key; `type` is never set and only carries the service type
 */
export interface Token<T> {
	readonly key: symbol;
	readonly type?: T;
}

interface ServiceRegistration {
	factory: ServiceFactory<unknown>;
	singleton: boolean;
	instance?: unknown;
}

function isDisposable(value: unknown): value is { dispose(): void } {
	return (
		typeof value === "object" &&
		value !== null &&
		"dispose" in value &&
		typeof value.dispose === "function"
	);
}

/**
 * ServiceContainer for dependency injection
 * Supports both singleton and transient service lifetimes
 */
export class ServiceContainer {
	private services = new Map<symbol, ServiceRegistration>();

	/**
	 * Register a transient service (new instance on each resolve)
	 */
	register<T>(token: Token<T>, factory: ServiceFactory<T>): void {
		this.services.set(token.key, { factory, singleton: false });
	}

	/**
	 * Register a singleton service (same instance on each resolve)
	 */
	singleton<T>(token: Token<T>, factory: ServiceFactory<T>): void {
		this.services.set(token.key, { factory, singleton: true });
	}

	/**
	 * Resolve a service by token
	 * @throws Error if service is not registered
	 */
	resolve<T>(token: Token<T>): T {
		const registration = this.services.get(token.key);

		if (!registration) {
			throw new Error(`Service not registered for token: ${token.key.toString()}`);
		}

		if (registration.singleton && "instance" in registration) {
			return registration.instance as T;
		}

		const instance = registration.factory();
		if (registration.singleton) {
			registration.instance = instance;
		}

		return instance as T;
	}

	has(token: Token<unknown>): boolean {
		return this.services.has(token.key);
	}

	/**
	 * Dispose all singleton instances that have a dispose method
	 */
	dispose(): void {
		for (const registration of this.services.values()) {
			if (registration.singleton && isDisposable(registration.instance)) {
				registration.instance.dispose();
			}
		}
		this.services.clear();
	}
}

export function createServiceContainer(): ServiceContainer {
	return new ServiceContainer();
}
