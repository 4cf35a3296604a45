export interface Wallet {
	readonly id: number;
	readonly name: string;
	/** ISO 4217-style three letter code, upper case. */
	readonly currency: string;
	readonly initialBalance: number;
	/** The implicit default wallet. Exactly one per dataset. */
	readonly system: boolean;
	readonly allowNegative: boolean;
	/** `false` once soft-deleted; the row is kept for history. */
	readonly isActive: boolean;
}

export interface CreateWalletInput {
	name: string;
	currency: string;
	initialBalance?: number;
	allowNegative?: boolean;
}
