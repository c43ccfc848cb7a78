export { toLandmarkFrame } from "./toLandmarkFrame";
