import _generate from "@babel/generator";
import _traverse from "@babel/traverse";

// Node imports these CommonJS packages as their exports object; Vitest hands over the default itself.
export const traverse = "default" in _traverse ? _traverse.default : _traverse;

export const generate = "default" in _generate ? _generate.default : _generate;
