/**
 * ServiceResolver: Pluggable Service Lookup for Parameter Binding
 *
 * The engine never owns a DI container. It issues capability queries to
 * whatever implements {@link ServiceResolver}: an adapter over an
 * application's container, or the small {@link ServiceContainer} below.
 *
 * @example
 * ```typescript
 * const Clock = createServiceToken<() => Date>('clock');
 *
 * const services = new ServiceContainer()
 *     .addSingleton(Clock, () => new Date())
 *     .addKeyed(AuditLog, 'tenant-a', tenantALog);
 *
 * const engine = createInterceptorEngine({ services });
 * ```
 *
 * @module
 */

// ── Tokens ───────────────────────────────────────────────

/** A typed, identity-compared service key. */
export interface InjectionToken<T> {
    readonly __brand: 'InjectionToken';
    readonly name: string;
    /** Phantom field carrying the service type; never set at runtime */
    readonly __type?: T;
}

/** Anything that identifies a service: a token or a class. */
export type ServiceToken<T = unknown> =
    | InjectionToken<T>
    | (abstract new (...args: never[]) => T);

/** Discriminator for keyed registrations of the same token. */
export type ServiceKey = string | symbol;

export function createServiceToken<T>(name: string): InjectionToken<T> {
    return Object.freeze({ __brand: 'InjectionToken' as const, name });
}

/** Printable name of a token, for error messages. */
export function tokenName(token: ServiceToken): string {
    return typeof token === 'function' ? token.name || '(anonymous class)' : token.name;
}

// ── Resolver Contract ────────────────────────────────────

/** Outcome of a lookup: `found: false` means the resolver has no such service. */
export type ServiceLookup<T> =
    | { readonly found: true; readonly value: T }
    | { readonly found: false };

/**
 * Capability-query interface consumed by the parameter binder.
 *
 * Lookups may be async; the binder awaits them.
 */
export interface ServiceResolver {
    /** Whether this resolver can satisfy `token` at all. */
    canResolve(token: ServiceToken): boolean;
    resolve<T>(token: ServiceToken<T>): ServiceLookup<T> | Promise<ServiceLookup<T>>;
    resolveKeyed<T>(token: ServiceToken<T>, key: ServiceKey): ServiceLookup<T> | Promise<ServiceLookup<T>>;
}

/** A resolver that knows no services. */
export const EMPTY_SERVICES: ServiceResolver = {
    canResolve: () => false,
    resolve: () => ({ found: false }),
    resolveKeyed: () => ({ found: false }),
};

// ── Default Container ────────────────────────────────────

type Factory<T> = (services: ServiceResolver) => T | Promise<T>;

interface Registration {
    readonly factory: Factory<unknown>;
    readonly singleton: boolean;
    instance?: Promise<unknown>;
}

/**
 * Map-backed {@link ServiceResolver}.
 *
 * Singletons are created lazily on first resolve and shared; transients
 * are created on every resolve.
 */
export class ServiceContainer implements ServiceResolver {
    private readonly _plain = new Map<ServiceToken, Registration>();
    private readonly _keyed = new Map<ServiceToken, Map<ServiceKey, Registration>>();

    /** Register a ready instance. */
    addInstance<T>(token: ServiceToken<T>, value: T): this {
        this._plain.set(token, { factory: () => value, singleton: true, instance: Promise.resolve(value) });
        return this;
    }

    /** Register a lazily created, shared instance. */
    addSingleton<T>(token: ServiceToken<T>, factory: Factory<T>): this {
        this._plain.set(token, { factory, singleton: true });
        return this;
    }

    /** Register a factory invoked on every resolve. */
    addTransient<T>(token: ServiceToken<T>, factory: Factory<T>): this {
        this._plain.set(token, { factory, singleton: false });
        return this;
    }

    /** Register an instance reachable only through `key`. */
    addKeyed<T>(token: ServiceToken<T>, key: ServiceKey, value: T): this {
        let byKey = this._keyed.get(token);
        if (!byKey) {
            byKey = new Map();
            this._keyed.set(token, byKey);
        }
        byKey.set(key, { factory: () => value, singleton: true, instance: Promise.resolve(value) });
        return this;
    }

    canResolve(token: ServiceToken): boolean {
        return this._plain.has(token);
    }

    async resolve<T>(token: ServiceToken<T>): Promise<ServiceLookup<T>> {
        return this._materialize<T>(this._plain.get(token));
    }

    async resolveKeyed<T>(token: ServiceToken<T>, key: ServiceKey): Promise<ServiceLookup<T>> {
        return this._materialize<T>(this._keyed.get(token)?.get(key));
    }

    private async _materialize<T>(registration: Registration | undefined): Promise<ServiceLookup<T>> {
        if (!registration) return { found: false };
        if (!registration.singleton) {
            return { found: true, value: await registration.factory(this) as T };
        }
        if (!registration.instance) {
            // A failed creation is not cached; the next resolve retries the factory.
            const created = Promise.resolve().then(() => registration.factory(this));
            registration.instance = created;
            created.catch(() => {
                if (registration.instance === created) delete registration.instance;
            });
        }
        return { found: true, value: await registration.instance as T };
    }
}
