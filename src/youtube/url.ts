const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;
const YOUTUBE_HOSTS = new Set(["youtube.com", "www.youtube.com", "m.youtube.com", "music.youtube.com"]);
const PATH_PREFIXES = ["embed", "v", "shorts", "live"];

function parseUrl(raw: string): URL | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  try {
    return new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
  } catch {
    return null;
  }
}

function validId(candidate: string | null | undefined): string | null {
  return candidate && VIDEO_ID.test(candidate) ? candidate : null;
}

export function extractVideoId(url: string): string | null {
  const parsed = parseUrl(url);
  if (!parsed) return null;
  const host = parsed.hostname.toLowerCase();
  const segments = parsed.pathname.split("/").filter(Boolean);

  if (host === "youtu.be" || host === "www.youtu.be") {
    return validId(segments[0]);
  }
  if (!YOUTUBE_HOSTS.has(host)) return null;

  if (segments[0] === "watch") {
    return validId(parsed.searchParams.get("v"));
  }
  if (segments.length >= 2 && PATH_PREFIXES.includes(segments[0])) {
    return validId(segments[1]);
  }
  return null;
}

export function isPlaylistUrl(url: string): boolean {
  return /[?&]list=/.test(url) || url.includes("/playlist?");
}

export function extractPlaylistId(url: string): string | null {
  const parsed = parseUrl(url);
  return parsed?.searchParams.get("list") || null;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
