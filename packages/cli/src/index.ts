#!/usr/bin/env node

import {MerkleTreeError} from "@chunktree/merkle";
import {YargsError} from "./util/index.js";
import {getChunktreeCli} from "./cli.js";

const chunktree = getChunktreeCli();

void chunktree
  .fail((msg, err) => {
    if (msg) {
      // Show command help message when no command is provided
      if (msg.includes("Not enough non-option arguments")) {
        chunktree.showHelp();
        console.log("\n");
      }
    }

    // Expected failures print their message only
    const errorMessage =
      err !== undefined
        ? err instanceof YargsError || err instanceof MerkleTreeError
          ? err.message
          : err.stack
        : msg || "Unknown error";

    console.error(` ✖ ${errorMessage}\n`);
    process.exit(1);
  })

  // Execute CLI
  .parse();
