export {
	type EvaluatorOptions,
	type Settled,
	type Direct,
	anyError,
	anyErrorAsync,
	take,
} from "./any-error.js";
