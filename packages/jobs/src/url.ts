const ID_PATTERN = /^[\w-]+$/;

function parse(url: string): URL | undefined {
  try {
    return new URL(url);
  } catch {
    return undefined;
  }
}

function validId(value: string | null | undefined): string | undefined {
  return value && ID_PATTERN.test(value) ? value : undefined;
}

/** Video id from a youtube.com/watch or youtu.be URL. */
export function extractVideoId(url: string): string | undefined {
  const parsed = parse(url);
  if (!parsed) return undefined;

  const host = parsed.hostname.replace(/^(www\.|m\.)/, "");
  if (host === "youtu.be") return validId(parsed.pathname.slice(1).split("/")[0]);
  if (host === "youtube.com" && parsed.pathname === "/watch") return validId(parsed.searchParams.get("v"));
  return undefined;
}

/** Playlist id from a youtube.com/playlist URL or a watch URL that carries `list=`. */
export function extractPlaylistId(url: string): string | undefined {
  const parsed = parse(url);
  if (!parsed) return undefined;

  const host = parsed.hostname.replace(/^(www\.|m\.)/, "");
  if (host !== "youtube.com") return undefined;
  if (parsed.pathname !== "/playlist" && parsed.pathname !== "/watch") return undefined;
  return validId(parsed.searchParams.get("list"));
}
