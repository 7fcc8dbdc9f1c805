/**
 * Binds before/after mapping callbacks to mapping methods
 */

import {
  MethodDescriptor,
  isAssignableTo,
  sourceParameters,
} from "@mapweave/frontend";
import { ResolutionSession } from "./session.js";
import {
  CallbackArgument,
  LifecycleCallbackReference,
} from "./builders/types.js";

const bindArguments = (
  callback: MethodDescriptor,
  method: MethodDescriptor,
  targetAvailable: boolean
): readonly CallbackArgument[] | undefined => {
  const args: CallbackArgument[] = [];

  for (const parameter of callback.parameters) {
    if (parameter.isMappingTarget) {
      if (!targetAvailable || !isAssignableTo(method.resultType, parameter.type)) {
        return undefined;
      }
      args.push({ kind: "target" });
      continue;
    }

    const source = sourceParameters(method).find((p) =>
      isAssignableTo(p.type, parameter.type)
    );
    if (!source) {
      return undefined;
    }
    args.push({ kind: "source", parameter: source });
  }

  return args;
};

/**
 * Callbacks of `role` applicable to `method`, in declaration order.
 * Before-mapping callbacks see the target only on update methods.
 */
export const bindLifecycleCallbacks = (
  session: ResolutionSession,
  method: MethodDescriptor,
  role: "beforeMapping" | "afterMapping"
): readonly LifecycleCallbackReference[] => {
  const targetAvailable = role === "afterMapping" || method.isUpdateMethod;

  return session.index.lifecycleMethods(role).flatMap((callback) => {
    if (!callback.qualifiers.every((q) => method.qualifiers.includes(q))) {
      return [];
    }
    const args = bindArguments(callback, method, targetAvailable);
    return args ? [{ method: callback, arguments: args }] : [];
  });
};
