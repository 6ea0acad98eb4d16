export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  map,
  flatMap,
  tryCatch,
} from "./result.js";
