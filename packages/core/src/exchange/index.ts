export type {
	BracketHandles,
	BracketRequest,
	BrokerClient,
	FillEvent,
	FillListener,
} from "./BrokerClient";
