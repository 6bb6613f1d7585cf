export {
	FileNotFoundError,
	FileAccessError,
	openFile,
	readChunk,
	readAll,
	closeFile,
	readTextFile,
	readJsonFile,
} from "./file-access.js";
