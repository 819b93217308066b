export { addSnapshot } from "./add-snapshot";
export { addVersion } from "./add-version";
export { getChildVersion } from "./get-child-version";
export { getSnapshot } from "./get-snapshot";
