/** The subset of the global `fetch` the outbound clients use; injectable so tests never open sockets. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (input, init) => fetch(input, init);

export async function readErrorBody(response: Response, limit = 500): Promise<string> {
  try {
    const text = await response.text();
    return text.length > limit ? `${text.slice(0, limit)}...` : text;
  } catch {
    return "";
  }
}
