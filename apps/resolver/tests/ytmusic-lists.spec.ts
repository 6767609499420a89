import { beforeEach, describe, expect, it } from "vitest";
import { FormatError, NotFoundError } from "../src/lib/errors";
import { createYtmAlbum, createYtmPlaylist, toYouTubeMusicUrl } from "../src/models/ytmusic-lists";
import { createFakeCatalog, seedAlbum, trackSearchHit, type FakeCatalog } from "./helpers/fake-catalog";

describe("youtube music lists", () => {
  let catalog: FakeCatalog;

  beforeEach(() => {
    catalog = createFakeCatalog();
    catalog.ytmusic.browseIds.set("OLAK5uy_night", "MPREb_night");
    catalog.ytmusic.albums.set("MPREb_night", {
      title: "Night Drive",
      artists: [{ name: "Nova" }],
      thumbnails: [{ url: "https://img.test/night.jpg" }],
      tracks: [
        { videoId: "v1", title: "Dawn", artists: [{ name: "Nova" }], duration_seconds: 200 },
        { videoId: null, title: "Hidden" },
        { videoId: "v2", title: "Dusk", artists: [{ name: "Nova" }, { name: "Guest" }] },
      ],
    });
    catalog.ytmusic.playlists.set("PLroad", {
      id: "PLroad",
      title: "Road Trip",
      description: "Songs for the car",
      author: { name: "Driver", id: "UCdriver" },
      tracks: [
        { videoId: "v1", title: "Dawn", artists: [{ name: "Nova" }], album: { name: "Night Drive" } },
        { videoId: "v3", title: "Gone", artists: [{ name: "Nova" }], isAvailable: false },
        { videoId: "v2", title: "Dusk", artists: [{ name: "Nova" }] },
      ],
    });
  });

  it("moves youtube urls onto the music host", () => {
    expect(toYouTubeMusicUrl("https://www.youtube.com/playlist?list=PLroad")).toBe(
      "https://music.youtube.com/playlist?list=PLroad",
    );
    expect(toYouTubeMusicUrl("https://youtube.com/playlist?list=PLroad")).toBe(
      "https://music.youtube.com/playlist?list=PLroad",
    );
  });

  it("builds album members that download from the video catalog", async () => {
    const album = await createYtmAlbum(catalog.ctx, "https://music.youtube.com/playlist?list=OLAK5uy_night", false);

    expect(album.kind).toBe("album");
    expect(album.name).toBe("Night Drive");
    expect(album.author_name).toBe("Nova");
    expect(album.cover_url).toBe("https://img.test/night.jpg");
    expect(album.length).toBe(2);
    expect(album.tracks.map((track) => track.download_url)).toEqual([
      "https://music.youtube.com/watch?v=v1",
      "https://music.youtube.com/watch?v=v2",
    ]);
    expect(album.tracks[1]?.artists).toEqual(["Nova", "Guest"]);
    expect(album.tracks[0]?.album_name).toBe("Night Drive");
    expect(album.tracks.map((track) => track.list_position)).toEqual([1, 2]);
    expect(catalog.ytmusic.calls).toEqual(["browse_id:OLAK5uy_night", "album:MPREb_night"]);
  });

  it("rejects album urls off the music host or without a list", async () => {
    await expect(createYtmAlbum(catalog.ctx, "https://www.youtube.com/playlist?list=OLAK5uy_night")).rejects.toBeInstanceOf(
      FormatError,
    );
    await expect(createYtmAlbum(catalog.ctx, "https://music.youtube.com/browse/MPREb_night")).rejects.toBeInstanceOf(
      FormatError,
    );
  });

  it("fails when the album has no browse id", async () => {
    await expect(
      createYtmAlbum(catalog.ctx, "https://music.youtube.com/playlist?list=OLAK5uy_unknown"),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("skips unavailable playlist entries", async () => {
    const playlist = await createYtmPlaylist(catalog.ctx, "https://music.youtube.com/playlist?list=PLroad&si=share", false);

    expect(playlist.name).toBe("Road Trip");
    expect(playlist.description).toBe("Songs for the car");
    expect(playlist.author_name).toBe("Driver");
    expect(playlist.author_url).toBe("https://music.youtube.com/channel/UCdriver");
    expect(playlist.length).toBe(2);
    expect(playlist.tracks.map((track) => track.name)).toEqual(["Dawn", "Dusk"]);
    expect(playlist.tracks[0]?.album_name).toBe("Night Drive");
    expect(catalog.ytmusic.calls).toEqual(["playlist:PLroad"]);
  });

  it("reads the playlist id from browse urls", async () => {
    catalog.ytmusic.playlists.set("VLPLroad", { title: "Road Trip", tracks: [] });

    const playlist = await createYtmPlaylist(catalog.ctx, "https://music.youtube.com/browse/VLPLroad", false);

    expect(playlist.length).toBe(0);
    expect(catalog.ytmusic.calls).toEqual(["playlist:VLPLroad"]);
  });

  it("re-resolves playlist members on the primary catalog", async () => {
    seedAlbum(catalog.spotify, {
      id: "alb1",
      name: "First Light",
      artist: "Nova",
      tracks: [
        { id: "t1", name: "Dawn" },
        { id: "t2", name: "Dusk" },
      ],
    });
    trackSearchHit(catalog.spotify, "Nova - Dawn", "t1");
    trackSearchHit(catalog.spotify, "Nova - Dusk", "t2");

    const playlist = await createYtmPlaylist(catalog.ctx, "https://music.youtube.com/playlist?list=PLroad");

    expect(playlist.urls).toEqual(["https://open.spotify.com/track/t1", "https://open.spotify.com/track/t2"]);
    expect(playlist.tracks.map((track) => track.download_url)).toEqual([
      "https://music.youtube.com/watch?v=v1",
      "https://music.youtube.com/watch?v=v2",
    ]);
    expect(playlist.tracks[0]?.album_name).toBe("Night Drive");
    expect(playlist.tracks[1]?.album_name).toBe("First Light");
  });
});
