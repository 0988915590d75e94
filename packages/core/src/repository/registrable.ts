import { getDefaultRepository, type MuxRepository, type RepositoryEntry } from "./mux-repository.js";

/**
 * Registration plumbing shared by the cache classes.
 */
export abstract class RegistrableCache implements RepositoryEntry {
	abstract readonly id: string;
	abstract flush(): Promise<void>;
	abstract clearMemory(): this;
	abstract clear(): Promise<void>;

	private repository: MuxRepository | undefined;

	/**
	 * Add this cache to a repository (the process-wide one by default).
	 * The repository retains the instance until unregister() is called.
	 */
	register(repository: MuxRepository = getDefaultRepository()): this {
		repository.register(this);
		this.repository = repository;
		return this;
	}

	unregister(): void {
		this.repository?.unregister(this);
		this.repository = undefined;
	}
}
