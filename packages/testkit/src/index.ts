export { createRng, nextInt, type Rng } from "./rng.js";
export { assert, describe, mock, test } from "./nodeTest.js";
