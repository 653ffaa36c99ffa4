export { createListField } from "./state";
export type { FieldStore, ListField, ListFieldOptions } from "./state";
export { createStoreBuffer } from "./adapters/storeBuffer";
export type { BufferAccess, BufferSnapshot } from "./adapters/storeBuffer";
