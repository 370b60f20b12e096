/**
 * List Source Interface
 *
 * Fetches a domain list (JSON array of strings) from a URI.
 * Implementations throw a ValidationError of kind LIST_LOAD_FAILURE and never return a partial list.
 */
export interface IListSource {
  fetchList(uri: string): Promise<string[]>;
}
