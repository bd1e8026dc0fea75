import "reflect-metadata";
import createDebug from "debug";
import type { MetadataAttachment } from "@wirebind/types";
import {
  ANNOTATED_MEMBERS_METADATA,
  ATTACHED_METADATA,
  PARAM_METADATA_ATTACHMENT,
} from "../metadata/constants";
import {
  type MemberKey,
  describeTarget,
  prependOwn,
  readOwn,
  trackMember,
  writeOwn,
} from "../metadata/storage";

const debug = createDebug("wirebind:core:annotations");

/**
 * Attaches an opaque metadata payload to an export. Applies to classes,
 * members and constructor or method parameters.
 */
export function WithMetadata(value: unknown) {
  return (
    target: object,
    propertyKey?: MemberKey,
    descriptorOrIndex?: PropertyDescriptor | number,
  ): void => {
    const attachment: MetadataAttachment = Object.freeze({ value });
    if (typeof descriptorOrIndex === "number") {
      const existing =
        readOwn<Map<number, MetadataAttachment>>(PARAM_METADATA_ATTACHMENT, target, propertyKey) ??
        new Map<number, MetadataAttachment>();
      // Decorators apply bottom-up: the top-most one is written last and wins.
      existing.set(descriptorOrIndex, attachment);
      writeOwn(PARAM_METADATA_ATTACHMENT, existing, target, propertyKey);
      debug("metadata %s[%d]", describeTarget(target, propertyKey), descriptorOrIndex);
      return;
    }
    debug("metadata %s", describeTarget(target, propertyKey));
    prependOwn(ATTACHED_METADATA, attachment, target, propertyKey);
    if (propertyKey !== undefined) {
      trackMember(ANNOTATED_MEMBERS_METADATA, target, propertyKey);
    }
  };
}
