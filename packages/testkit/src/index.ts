export { assert, describe, test } from "./nodeTest.js";
export { mustExist, mustFail, mustOk, type FailureLike, type ResultLike } from "./results.js";
