import { beforeEach, describe, expect, it } from "vitest";
import { AuthError, NotFoundError } from "../src/lib/errors";
import {
  albumFromUrl,
  artistFromUrl,
  followedArtistsList,
  playlistFromUrl,
  savedTracksList,
  trackListFromSearchTerm,
} from "../src/models/track-list";
import {
  catalogArtist,
  catalogTrack,
  createFakeCatalog,
  pageOf,
  seedAlbum,
  seedPlaylist,
  type FakeCatalog,
} from "./helpers/fake-catalog";

describe("track lists", () => {
  let catalog: FakeCatalog;

  beforeEach(() => {
    catalog = createFakeCatalog();
    seedAlbum(catalog.spotify, {
      id: "alb1",
      name: "First Light",
      artist: "Nova",
      tracks: [
        { id: "t1", name: "Dawn" },
        { id: "t2", name: "Dusk" },
        { id: "t3", name: "Noon" },
      ],
    });
  });

  it("numbers album members from one and derives urls and length", async () => {
    const album = await albumFromUrl(catalog.ctx, "https://open.spotify.com/album/alb1");

    expect(album.kind).toBe("album");
    expect(album.name).toBe("First Light");
    expect(album.author_name).toBe("Nova");
    expect(album.author_url).toBe("https://open.spotify.com/artist/arnova");
    expect(album.cover_url).toBe("https://img.test/alb1.jpg");
    expect(album.length).toBe(3);
    expect(album.tracks.map((track) => track.list_position)).toEqual([1, 2, 3]);
    expect(album.urls).toEqual([
      "https://open.spotify.com/track/t1",
      "https://open.spotify.com/track/t2",
      "https://open.spotify.com/track/t3",
    ]);
    expect(catalog.spotify.calls).toEqual(["album:alb1"]);
  });

  it("fetches every member when asked to", async () => {
    const album = await albumFromUrl(catalog.ctx, "https://open.spotify.com/album/alb1", true);

    expect(album.tracks[0]?.genres).toEqual(["test-genre"]);
    expect(album.tracks[0]?.publisher).toBe("Test Label");
    expect(catalog.spotify.calls.filter((call) => call.startsWith("track:"))).toEqual(["track:t1", "track:t2", "track:t3"]);
  });

  it("counts only retained playlist entries", async () => {
    seedPlaylist(catalog.spotify, {
      id: "pl1",
      name: "Mix",
      trackIds: ["t2", "t1"],
      extraEntries: [
        { is_local: true, track: { id: "loc1", name: "Home Demo", type: "track", is_local: true } },
        { track: null },
        { track: { id: "ep1", name: "Episode", type: "episode" } },
      ],
    });

    const playlist = await playlistFromUrl(catalog.ctx, "https://open.spotify.com/playlist/pl1");

    expect(playlist.length).toBe(2);
    expect(playlist.tracks.map((track) => track.name)).toEqual(["Dusk", "Dawn"]);
    expect(playlist.tracks.map((track) => track.list_position)).toEqual([1, 2]);
    expect(playlist.description).toBe("Mix description");
    expect(playlist.author_name).toBe("Playlist Owner");
    expect(playlist.author_url).toBe("https://open.spotify.com/user/playlist-owner");
    expect(playlist.cover_url).toBe("https://img.test/pl1.jpg");
  });

  it("keeps one copy of each song crediting the artist", async () => {
    seedAlbum(catalog.spotify, {
      id: "alb2",
      name: "FIRST LIGHT",
      artist: "Nova",
      tracks: [{ id: "t9", name: "Bonus" }],
    });
    seedAlbum(catalog.spotify, {
      id: "alb3",
      name: "Second Wind",
      artist: "Nova",
      albumType: "single",
      tracks: [
        { id: "t4", name: "dawn" },
        { id: "t5", name: "Gale" },
        { id: "t6", name: "Guest Spot", artists: ["Someone Else"] },
      ],
    });

    const artist = await artistFromUrl(catalog.ctx, "https://open.spotify.com/artist/arnova");

    expect(artist.kind).toBe("artist");
    expect(artist.name).toBe("Nova");
    expect(artist.cover_url).toBe("https://img.test/arnova.jpg");
    expect(artist.tracks.map((track) => track.name)).toEqual(["Dawn", "Dusk", "Noon", "Gale"]);
    expect(artist.tracks.map((track) => track.list_position)).toEqual([1, 2, 3, 4]);
    expect(catalog.spotify.calls).not.toContain("album:alb2");
  });

  it("requires a session for saved tracks", async () => {
    await expect(savedTracksList(catalog.ctx)).rejects.toBeInstanceOf(AuthError);
    expect(catalog.spotify.calls).toEqual([]);
  });

  it("lists saved tracks of the signed-in user", async () => {
    catalog.spotify.userAuth = true;
    catalog.spotify.savedTracks = [{ track: catalogTrack(catalog.spotify, "t3") }, { track: null }];

    const saved = await savedTracksList(catalog.ctx);

    expect(saved.kind).toBe("saved");
    expect(saved.url).toBe("saved");
    expect(saved.tracks.map((track) => track.song_id)).toEqual(["t3"]);
  });

  it("joins the discographies of followed artists", async () => {
    catalog.spotify.userAuth = true;
    catalog.spotify.followedArtists = [catalogArtist(catalog.spotify, "Nova")];

    const followed = await followedArtistsList(catalog.ctx);

    expect(followed.kind).toBe("followed");
    expect(followed.length).toBe(3);
    expect(followed.tracks.map((track) => track.list_position)).toEqual([1, 2, 3]);
  });

  it("opens the first search hit", async () => {
    catalog.spotify.setSearch("album", "First Light", {
      albums: pageOf([null, { id: "alb1", name: "First Light" }]),
    });

    const album = await trackListFromSearchTerm(catalog.ctx, "album", "First Light");

    expect(album.url).toBe("https://open.spotify.com/album/alb1");
    expect(catalog.spotify.calls[0]).toBe("search:album:First Light:1");
  });

  it("fails when a list search has no hits", async () => {
    await expect(trackListFromSearchTerm(catalog.ctx, "playlist", "Nope")).rejects.toThrow(
      "No playlist results found for: Nope",
    );
  });

  it("rejects urls of another kind", async () => {
    await expect(albumFromUrl(catalog.ctx, "https://open.spotify.com/playlist/pl1")).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
