export const EXPORT_METADATA = "wirebind:export";
export const EXPORTED_MEMBERS_METADATA = "wirebind:exported-members";
export const IMPLEMENTS_METADATA = "wirebind:implements";
export const REUSE_METADATA = "wirebind:reuse";
export const WEAKLY_REFERENCED_METADATA = "wirebind:weakly-referenced";
export const PREVENT_DISPOSAL_METADATA = "wirebind:prevent-disposal";
export const ATTACHED_METADATA = "wirebind:metadata";
export const CONDITION_METADATA = "wirebind:condition";
export const PARAM_IMPORT_METADATA = "wirebind:param-import";
export const PROPERTY_IMPORT_METADATA = "wirebind:property-import";
export const IMPORTED_PROPERTIES_METADATA = "wirebind:imported-properties";
export const PARAM_METADATA_ATTACHMENT = "wirebind:param-metadata";
export const ANNOTATED_MEMBERS_METADATA = "wirebind:annotated-members";
export const PARAM_REUSE_METADATA = "wirebind:param-reuse";
