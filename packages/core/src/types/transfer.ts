export interface Transfer {
	readonly id: number;
	readonly fromWalletId: number;
	readonly toWalletId: number;
	readonly date: string;
	readonly amountOriginal: number;
	readonly currency: string;
	readonly rateAtOperation: number;
	readonly amountKzt: number;
	readonly description: string;
}
