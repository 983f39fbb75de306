import Module from "module";
import path from "path";

// Simple runtime alias resolver for CommonJS requires.
//
// The code imports through tsconfig-style aliases ("#lib/...", etc.) rather than
// relative paths. TypeScript and Jest resolve those from their own config; the
// compiled output in dist/ needs this. Node's subpath imports want exact file
// mappings, which is why the resolver is patched instead.

const aliasRoots: Record<string, string> = {
  "#handlers/": path.resolve(__dirname, "handlers"),
  "#lib/": path.resolve(__dirname, "lib"),
  "#middleware/": path.resolve(__dirname, "middleware"),
  "#models/": path.resolve(__dirname, "models"),
  "#modules/": path.resolve(__dirname, "modules"),
};

// Workspace packages point their package.json at TypeScript sources; the
// compiled copies sit beside this package in dist/.
const packageRoots: Record<string, string> = {
  "keyward-core": path.resolve(__dirname, "../../keyward-core/src"),
};

const PATCHED_FLAG = "__KEYWARD_ALIAS_RESOLVER_PATCHED__";

function resolveAlias(request: string): string | null {
  if (Object.prototype.hasOwnProperty.call(packageRoots, request)) {
    return packageRoots[request];
  }
  for (const prefix of Object.keys(aliasRoots)) {
    if (request.startsWith(prefix)) {
      return path.join(aliasRoots[prefix], request.slice(prefix.length));
    }
  }
  return null;
}

// Module._resolveFilename is internal, so @types/node does not declare it.
const originalResolveFilename: unknown = Reflect.get(Module, "_resolveFilename");

if (typeof originalResolveFilename === "function" && !Reflect.get(globalThis, PATCHED_FLAG)) {
  Reflect.set(globalThis, PATCHED_FLAG, true);
  Reflect.set(
    Module,
    "_resolveFilename",
    function (this: unknown, request: string, ...rest: unknown[]): string {
      const rewritten = resolveAlias(request);
      if (rewritten) {
        try {
          return Reflect.apply(originalResolveFilename, this, [rewritten, ...rest]);
        } catch {
          // Not found under the alias root; let Node try the original request.
        }
      }
      return Reflect.apply(originalResolveFilename, this, [request, ...rest]);
    },
  );
}
