import type { CallNode, PyNode } from "../syntax.js";
import { defineRule } from "./define.js";
import { calleeName, dottedName, findKeyword, isConstant, isStaticString } from "../../utils/ast.js";

const EXECUTE_METHODS = new Set([
  "execute",
  "executemany",
  "executescript",
  "mogrify",
  "raw",
  "read_sql",
  "read_sql_query",
]);

function containsLiteral(node: PyNode): boolean {
  if (node.kind === "Str") {
    return true;
  }
  return node.kind === "BinOp" && node.op === "+" && (containsLiteral(node.left) || containsLiteral(node.right));
}

/** A string assembled at runtime rather than a literal with placeholders. */
function describeDynamicString(node: PyNode): string | undefined {
  if (node.kind === "Str" && node.interpolations.length > 0) {
    return "an f-string";
  }
  if (node.kind === "BinOp" && node.op === "%" && node.left.kind === "Str") {
    return "%-formatting";
  }
  if (node.kind === "BinOp" && node.op === "+" && containsLiteral(node)) {
    return "string concatenation";
  }
  if (node.kind === "Call" && node.func.kind === "Attribute" && node.func.attr === "format" && node.func.value.kind === "Str") {
    return "str.format()";
  }
  return undefined;
}

export const ruleInjectionHeuristic = defineRule({
  id: "injection-heuristic",
  title: "Query built from interpolated string",
  category: "security",
  severity: "critical",
  kinds: ["Call"],
  description: "SQL assembled with f-strings, concatenation or format() lets input change the statement.",
  recommendation: "Pass values as query parameters: cursor.execute(\"... WHERE id = %s\", (user_id,)).",
  check(call) {
    const name = calleeName(call);
    const [statement] = call.args;
    if (name === undefined || !EXECUTE_METHODS.has(name) || !statement) {
      return undefined;
    }
    const how = describeDynamicString(statement);
    if (!how) {
      return undefined;
    }
    return { node: call, message: `${name}() receives a query built with ${how}; possible SQL injection.` };
  },
});

export const ruleCommandInjection = defineRule({
  id: "command-injection",
  title: "Shell command injection",
  category: "security",
  severity: "critical",
  kinds: ["Call"],
  description: "Running a command through the shell lets metacharacters in the input execute extra commands.",
  recommendation: "Pass an argument list to subprocess.run without shell=True.",
  check(call) {
    const name = dottedName(call.func);
    if (name === undefined) {
      return undefined;
    }
    if (name.startsWith("subprocess.")) {
      const shell = findKeyword(call, "shell");
      if (!shell || !isConstant(shell.value, "True")) {
        return undefined;
      }
      return { node: call, message: `${name}() runs with shell=True.` };
    }
    if (name === "os.system" || name === "os.popen") {
      const [command] = call.args;
      if (!command || isStaticString(command)) {
        return undefined;
      }
      return { node: call, message: `${name}() runs a command assembled at runtime.` };
    }
    return undefined;
  },
});

const SECRET_NAME = /(password|passwd|pwd|secret|token|api_?key|apikey|private_?key|access_?key|credentials?)$/i;
const NOT_A_SECRET_NAME = /(_(url|uri|path|file|name|type|field|header|prefix|pattern|env|var))$/i;
const PLACEHOLDER =
  /^(|\*+|x+|changeme|change[_-]me|placeholder|dummy|example|none|null|todo|your[_-].*|<.*>|\$\{.*\}|\{\{.*\}\})$/i;

function secretTarget(node: PyNode): string | undefined {
  const name = node.kind === "Name" ? node.id : node.kind === "Attribute" ? node.attr : undefined;
  if (name === undefined || !SECRET_NAME.test(name) || NOT_A_SECRET_NAME.test(name)) {
    return undefined;
  }
  return name;
}

function isHardcodedSecretValue(value: PyNode | undefined): boolean {
  return value !== undefined && value.kind === "Str" && !value.formatted && !value.bytes && !PLACEHOLDER.test(value.value);
}

export const ruleHardcodedSecret = defineRule({
  id: "hardcoded-secret",
  title: "Hardcoded secret",
  category: "security",
  severity: "high",
  kinds: ["Assign", "Keyword"],
  description: "Credentials in source code end up in version control and every copy of the repository.",
  recommendation: "Read the secret from the environment or a secrets manager.",
  check(node) {
    if (node.kind === "Keyword") {
      if (!SECRET_NAME.test(node.arg) || NOT_A_SECRET_NAME.test(node.arg) || !isHardcodedSecretValue(node.value)) {
        return undefined;
      }
      return { node, message: `Argument '${node.arg}' is a hardcoded credential.` };
    }
    if (!isHardcodedSecretValue(node.value)) {
      return undefined;
    }
    for (const target of node.targets) {
      const name = secretTarget(target);
      if (name !== undefined) {
        return { node, message: `'${name}' is assigned a hardcoded credential.` };
      }
    }
    return undefined;
  },
});

const WEAK_ALGORITHMS = new Set(["md5", "sha1"]);

export const ruleWeakHash = defineRule({
  id: "weak-hash",
  title: "Weak hash algorithm",
  category: "security",
  severity: "medium",
  kinds: ["Call"],
  description: "MD5 and SHA-1 are broken for collision resistance and unsuitable for passwords or signatures.",
  recommendation: "Use hashlib.sha256 for integrity, or a password KDF (bcrypt, scrypt, argon2) for passwords.",
  check(call) {
    const name = dottedName(call.func);
    const usedForSecurity = findKeyword(call, "usedforsecurity");
    if (usedForSecurity && isConstant(usedForSecurity.value, "False")) {
      return undefined;
    }
    let algorithm: string | undefined;
    if (name === "hashlib.md5" || name === "hashlib.sha1") {
      algorithm = name.slice("hashlib.".length);
    } else if (name === "hashlib.new") {
      const [first] = call.args;
      if (first?.kind === "Str" && WEAK_ALGORITHMS.has(first.value.toLowerCase())) {
        algorithm = first.value.toLowerCase();
      }
    }
    if (algorithm === undefined) {
      return undefined;
    }
    return { node: call, message: `${algorithm.toUpperCase()} is a weak hash algorithm.` };
  },
});

const UNSAFE_LOADERS = new Set([
  "pickle.load",
  "pickle.loads",
  "cPickle.load",
  "cPickle.loads",
  "dill.load",
  "dill.loads",
  "marshal.load",
  "marshal.loads",
  "yaml.unsafe_load",
]);

function isSafeYamlLoader(node: PyNode | undefined): boolean {
  const name = node ? dottedName(node) : undefined;
  return name !== undefined && /(^|\.)C?SafeLoader$/.test(name);
}

export const ruleUnsafeDeserialization = defineRule({
  id: "unsafe-deserialization",
  title: "Unsafe deserialization",
  category: "security",
  severity: "high",
  kinds: ["Call"],
  description: "pickle, marshal and full YAML loading can construct arbitrary objects and run code.",
  recommendation: "Use json, or yaml.safe_load, for data that crosses a trust boundary.",
  check(call) {
    const name = dottedName(call.func);
    if (name === undefined) {
      return undefined;
    }
    if (UNSAFE_LOADERS.has(name)) {
      return { node: call, message: `${name}() can execute code embedded in the data.` };
    }
    if (name === "yaml.load") {
      const loader = findKeyword(call, "Loader")?.value ?? call.args[1];
      if (isSafeYamlLoader(loader)) {
        return undefined;
      }
      return { node: call, message: "yaml.load() without SafeLoader can construct arbitrary objects." };
    }
    return undefined;
  },
});

export const ruleTlsVerificationDisabled = defineRule({
  id: "tls-verification-disabled",
  title: "TLS verification disabled",
  category: "security",
  severity: "high",
  kinds: ["Keyword", "Call"],
  description: "Skipping certificate verification allows man-in-the-middle attacks.",
  recommendation: "Keep verification on; point 'verify' at a CA bundle for private certificates.",
  check(node) {
    if (node.kind === "Keyword") {
      if (node.arg !== "verify" || !isConstant(node.value, "False")) {
        return undefined;
      }
      return { node, message: "Certificate verification is disabled with verify=False." };
    }
    if (dottedName(node.func) !== "ssl._create_unverified_context") {
      return undefined;
    }
    return { node, message: "ssl._create_unverified_context() skips certificate checks." };
  },
});

const SENSITIVE_RANDOM_TARGET = /(token|password|passwd|secret|key|salt|nonce|otp|session)/i;

function usesRandomModule(value: PyNode): boolean {
  if (value.kind !== "Call") {
    return false;
  }
  const name = dottedName(value.func);
  if (name?.startsWith("random.")) {
    return true;
  }
  // "".join(random.choice(alphabet) for _ in range(n))
  const [first] = value.args;
  if (calleeName(value) === "join" && first?.kind === "Comprehension") {
    return usesRandomModule(first.element);
  }
  return false;
}

export const ruleInsecureRandom = defineRule({
  id: "insecure-random",
  title: "Predictable random value for a secret",
  category: "security",
  severity: "medium",
  kinds: ["Assign"],
  description: "The random module is not cryptographically secure; its output can be predicted.",
  recommendation: "Use the secrets module (secrets.token_urlsafe, secrets.choice).",
  check(node) {
    if (!node.value || !usesRandomModule(node.value)) {
      return undefined;
    }
    const target = node.targets.find((candidate) => {
      const name = candidate.kind === "Name" ? candidate.id : candidate.kind === "Attribute" ? candidate.attr : "";
      return SENSITIVE_RANDOM_TARGET.test(name);
    });
    if (!target) {
      return undefined;
    }
    return { node, message: `'${target.text}' is generated with the non-cryptographic random module.` };
  },
});

export const ruleInsecureTempfile = defineRule({
  id: "insecure-tempfile",
  title: "tempfile.mktemp",
  category: "security",
  severity: "medium",
  kinds: ["Call"],
  description: "mktemp returns a name without creating the file, leaving a race window.",
  recommendation: "Use tempfile.NamedTemporaryFile or tempfile.mkstemp.",
  check(call) {
    if (dottedName(call.func) !== "tempfile.mktemp") {
      return undefined;
    }
    return { node: call, message: "tempfile.mktemp() is vulnerable to a file-creation race." };
  },
});

function isRunCall(call: CallNode): boolean {
  return call.func.kind === "Attribute" && call.func.attr === "run";
}

export const ruleDebugEnabled = defineRule({
  id: "debug-enabled",
  title: "Debug mode enabled",
  category: "security",
  severity: "medium",
  kinds: ["Call"],
  description: "Framework debug mode exposes tracebacks and, for Flask, an interactive console.",
  recommendation: "Read the debug flag from configuration and keep it off in production.",
  check(call) {
    const debug = findKeyword(call, "debug");
    if (!isRunCall(call) || !debug || !isConstant(debug.value, "True")) {
      return undefined;
    }
    return { node: call, message: `${call.func.text}() is started with debug=True.` };
  },
});

export const SECURITY_RULES = [
  ruleInjectionHeuristic,
  ruleCommandInjection,
  ruleHardcodedSecret,
  ruleWeakHash,
  ruleUnsafeDeserialization,
  ruleTlsVerificationDisabled,
  ruleInsecureRandom,
  ruleInsecureTempfile,
  ruleDebugEnabled,
];
