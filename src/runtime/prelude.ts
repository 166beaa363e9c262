// src/runtime/prelude.ts
//
// Root declarations written in Quill itself, evaluated once per engine into
// its root scope after the natives are installed: the exception hierarchy,
// the DelegateAccess enum handed to delegate `bind` hooks, and `lazy`.

import { EXCEPTION_CLASS_NAMES } from "../diagnostics/scriptErrors";

export const PRELUDE_FILE = "<prelude>";

const exceptions = EXCEPTION_CLASS_NAMES.filter((name) => name !== "Exception")
  .map((name) => `class ${name}(message = null) : Exception(message)`)
  .join("\n");

export const PRELUDE_SOURCE = `
class Exception(val message = null)
${exceptions}

enum DelegateAccess { Val, Var, Callable }

class Lazy(private val creator) {
    private var ready = false
    private var cached = null

    fun getValue(thisRef, name) {
        if (!ready) {
            cached = creator()
            ready = true
        }
        cached
    }

    fun bind(name, access, thisRef) {
        if (access == DelegateAccess.Var) throw IllegalArgumentException("lazy delegate of '" + name + "' must be a val")
        this
    }
}

fun lazy(creator) = Lazy(creator)
`;
