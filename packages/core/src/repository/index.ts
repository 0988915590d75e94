/**
 * Repository exports.
 */

export {
	MuxRepository,
	getDefaultRepository,
	resetDefaultRepository,
	type RepositoryEntry,
} from "./mux-repository.js";
export { RegistrableCache } from "./registrable.js";
