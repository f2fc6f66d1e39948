/**
 * Extraction module - typed access to request data.
 */

export {
  bytesBody,
  header,
  jsonBody,
  pathParam,
  pathParamList,
  pathParams,
  queryParam,
  queryParams,
  requireHeader,
  textBody,
} from "./extract.ts";
