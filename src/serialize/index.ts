export {
	type JsonValue,
	type SerializedIssue,
	serializeValue,
	dumpJson,
	serializeIssues,
} from "./serializer.js";
