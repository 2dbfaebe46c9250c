import {digest} from "@chainsafe/as-sha256";
import {createHashAlgorithm} from "./create.js";

export const sha256 = createHashAlgorithm({name: "sha256", digestSize: 32, digest});
