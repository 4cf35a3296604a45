export {
	type CalendarDate,
	daysInMonth,
	ensureNotFuture,
	formatYmd,
	parseYmd,
	todayYmd,
} from "./date.js";
export {
	BALANCE_EPSILON,
	computeRate,
	DEFAULT_BASE_CURRENCY,
	nearlyEqual,
	RATE_EPSILON,
	signedAmountKzt,
} from "./money.js";
export {
	ensureFiniteAmount,
	ensureNonBlank,
	ensurePositiveId,
	ensureValidPeriod,
	isMandatoryPeriod,
	MANDATORY_PERIODS,
	normalizeCurrency,
} from "./validate.js";
