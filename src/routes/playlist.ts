import { z } from "zod";
import { NotPlaylistError, PlaylistUnavailableError } from "../errors.js";
import type { PlaylistVideo } from "../types.js";
import { queryBoolean, sendFailure, type App, type RouteDeps } from "./shared.js";

const PlaylistBody = z.object({
  playlistUrl: z.string().min(1),
  maxVideos: z.number().int().min(1).optional(),
});

const CheckQuery = z.object({ url: z.string().min(1) });

const VideosQuery = z.object({
  playlistUrl: z.string().min(1),
  maxVideos: z.coerce.number().int().min(1).optional(),
  apiV3: queryBoolean.optional(),
});

function toWire(videos: PlaylistVideo[]) {
  return videos.map((v, i) => ({
    videoId: v.id,
    url: v.url,
    title: v.title,
    index: i + 1,
    position: v.position,
  }));
}

export function registerPlaylistRoutes(app: App, { services, logger }: RouteDeps) {
  const log = logger.child({ router: "playlist" });

  app.post("/playlist/info", async (req, reply) => {
    const parsed = PlaylistBody.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { playlistUrl, maxVideos } = parsed.data;
    try {
      if (!services.youtube.isPlaylistUrl(playlistUrl)) throw new NotPlaylistError();
      const details = await services.youtube.getPlaylistInfo(playlistUrl);
      if (!details) throw new PlaylistUnavailableError(playlistUrl);

      const videos = maxVideos ? details.videos.slice(0, maxVideos) : details.videos;
      return reply.code(200).send({
        playlistInfo: details.info,
        videos: toWire(videos),
        totalVideos: details.info.videoCount,
        returnedVideos: videos.length,
      });
    } catch (err) {
      return sendFailure(reply, log, err, "get playlist info");
    }
  });

  app.get("/playlist/check", async (req, reply) => {
    const parsed = CheckQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { url } = parsed.data;
    const isPlaylist = services.youtube.isPlaylistUrl(url);
    const type = isPlaylist ? "playlist" : services.youtube.extractVideoId(url) ? "video" : "unknown";
    return reply.code(200).send({ url, isPlaylist, type });
  });

  app.get("/playlist/videos", async (req, reply) => {
    const parsed = VideosQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { playlistUrl, maxVideos, apiV3 } = parsed.data;
    try {
      if (!services.youtube.isPlaylistUrl(playlistUrl)) throw new NotPlaylistError();
      if (apiV3) {
        const resource = await services.youtube.getPlaylistResource(playlistUrl, maxVideos);
        return reply.code(200).send({ ...resource, count: resource.items.length });
      }
      const videos = await services.youtube.getPlaylistVideos(playlistUrl, maxVideos);
      return reply.code(200).send({ videos: toWire(videos), count: videos.length });
    } catch (err) {
      return sendFailure(reply, log, err, "get playlist videos");
    }
  });
}
