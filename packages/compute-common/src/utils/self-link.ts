/**
 * Extract the short name from a resource self link.
 *
 * "https://www.googleapis.com/compute/v1/projects/p/zones/us-central1-a" -> "us-central1-a"
 * A plain name is returned unchanged.
 */
export function nameFromSelfLink(selfLink: string): string {
  const index = selfLink.lastIndexOf("/");
  return index === -1 ? selfLink : selfLink.substring(index + 1);
}
