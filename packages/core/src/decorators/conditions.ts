import "reflect-metadata";
import createDebug from "debug";
import type { ExportCondition } from "@wirebind/types";
import { ANNOTATED_MEMBERS_METADATA, CONDITION_METADATA } from "../metadata/constants";
import {
  type ClassOrMemberDecorator,
  describeTarget,
  prependOwn,
  trackMember,
} from "../metadata/storage";

const debug = createDebug("wirebind:core:annotations");

/**
 * Guards the export on the annotated class or member. Conditions accumulate;
 * the export applies to a request only when every one of them passes.
 */
export function ExportWhen(condition: ExportCondition): ClassOrMemberDecorator {
  return (target, propertyKey) => {
    debug("condition %s → %s", describeTarget(target, propertyKey), condition.constructor.name);
    prependOwn(CONDITION_METADATA, condition, target, propertyKey);
    if (propertyKey !== undefined) {
      trackMember(ANNOTATED_MEMBERS_METADATA, target, propertyKey);
    }
  };
}
