import {compare} from "./compare.js";
import {digest} from "./digest.js";
import {root} from "./root.js";

export const cmds = [digest, root, compare];
