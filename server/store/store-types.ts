export interface StoreConfig {
	/** Path to JSON file */
	filePath: string;
}

export interface VersionedFile<T> {
	version: number;
	data: T;
}
