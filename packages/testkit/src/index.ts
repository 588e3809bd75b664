export { assert, describe, test } from "./nodeTest.js";
export { createFakeTimers, type FakeTimers } from "./fakeTimers.js";
