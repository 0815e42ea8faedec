/**
 * Default policy module
 */

export {
	type DefaultPolicy,
	type DefaultPolicyInput,
	SECONDS_IN_DAY,
	DEBT_LIMIT_TANGENT_DECIMALS,
	DEBT_LIMIT_TANGENT_SCALE,
	DEFAULT_DEBT_LIMIT_POSTPONEMENT,
	FixedDeadlinePolicy,
	DebtLimitPolicy,
	computeDebtLimitTangent,
	debtLimit,
	isDebtLimitExceeded,
} from "./default-policy.js";
