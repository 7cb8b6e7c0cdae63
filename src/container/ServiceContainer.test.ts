import { describe, expect, it, vi } from "vitest";
import { createServiceContainer, type Token } from "./ServiceContainer";

const counter: Token<{ id: number }> = { key: Symbol("counter") };
const closable: Token<{ dispose: () => void }> = { key: Symbol("closable") };

describe("ServiceContainer", () => {
	it("builds a singleton once", () => {
		const container = createServiceContainer();
		let built = 0;
		container.singleton(counter, () => ({ id: ++built }));

		expect(container.resolve(counter)).toBe(container.resolve(counter));
		expect(built).toBe(1);
	});

	it("builds a transient service on every resolve", () => {
		const container = createServiceContainer();
		let built = 0;
		container.register(counter, () => ({ id: ++built }));

		container.resolve(counter);

		expect(container.resolve(counter).id).toBe(2);
	});

	it("lets a later registration replace an earlier one", () => {
		const container = createServiceContainer();
		container.singleton(counter, () => ({ id: 1 }));
		container.singleton(counter, () => ({ id: 2 }));

		expect(container.resolve(counter).id).toBe(2);
	});

	it("fails loudly for unknown tokens", () => {
		const container = createServiceContainer();

		expect(container.has(counter)).toBe(false);
		expect(() => container.resolve(counter)).toThrow(
			"Service not registered for token: Symbol(counter)",
		);
	});

	it("disposes resolved singletons", () => {
		const container = createServiceContainer();
		const dispose = vi.fn();
		container.singleton(closable, () => ({ dispose }));
		container.resolve(closable);

		container.dispose();

		expect(dispose).toHaveBeenCalledTimes(1);
		expect(container.has(closable)).toBe(false);
	});
});
