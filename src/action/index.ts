export {
	ActionType,
	StorageSlotKind,
	type Action,
	type FinalizeEvmContractAction,
	type FinalizeEvmContractFields,
	type RegisterSpotTokenAction,
	type RegisterSpotTokenFields,
	type StorageSlotSelector,
} from "./types.js";
export {
	type ActionRequest,
	MAX_TOKEN_DECIMALS,
	buildAction,
	buildFinalizeEvmContract,
	buildRegisterSpotToken,
	describeStorageSlot,
	rebuildAction,
} from "./action-builder.js";
export {
	type WireAction,
	type WireFinalizeEvmContract,
	type WireRegisterToken,
	type WireStorageSlotInput,
	encodeAction,
	toWireAction,
	toWireJson,
} from "./wire.js";
