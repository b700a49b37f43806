export enum DestroyerStatus {
	Live,
	Releasing,
	Released
}
