import { expect } from 'chai';

import {
  MPRIS_PLAYER_INTERFACE,
  MPRIS_ROOT_INTERFACE,
} from '../../../src/constants.js';
import { CommandRejectedError, PlayerProbeError } from '../../../src/lib/errors.js';
import {
  ChromiumFacade,
  MAX_PENDING_COMMANDS,
  MprisFacade,
  VlcFacade,
  createFacade,
  selectFacade,
} from '../../../src/lib/players/index.js';
import type {
  PlayerFacadeOptions,
  PlayerSnapshot,
} from '../../../src/lib/players/index.js';
import { deferred, flush, rejectionOf, waitFor } from '../helpers/async.js';
import { FakeMediaBus, FakePlayer } from '../helpers/fake-media-bus.js';

const SPOTIFY = 'org.mpris.MediaPlayer2.spotify';
const CHROMIUM = 'org.mpris.MediaPlayer2.chromium.instance4242';
const VLC = 'org.mpris.MediaPlayer2.vlc';

function fullPlayer(): Record<string, unknown> {
  return {
    PlaybackStatus: 'Playing',
    CanControl: true,
    CanPlay: true,
    CanPause: true,
    CanGoNext: true,
    CanGoPrevious: false,
    CanSeek: true,
    MinimumRate: 0.5,
    MaximumRate: 2,
    Rate: 1,
    Position: 5_000_000n,
    Metadata: {
      'xesam:title': 'Lullaby',
      'xesam:artist': ['First Band', 'Second Band'],
      'mpris:length': 180_000_000n,
      'mpris:trackid': '/org/example/track/1',
    },
  };
}

describe('PlayerFacade', function () {
  let state: FakePlayer;
  let bus: FakeMediaBus;
  const created: MprisFacade[] = [];

  beforeEach(function () {
    state = new FakePlayer({ root: { Identity: 'Spotify' }, player: fullPlayer() });
    bus = new FakeMediaBus({ [SPOTIFY]: state });
  });

  afterEach(function () {
    for (const facade of created.splice(0)) {
      facade.dispose();
    }
  });

  function create(options: PlayerFacadeOptions = {}): MprisFacade {
    const facade = new MprisFacade(SPOTIFY, bus, options);
    created.push(facade);
    return facade;
  }

  async function probed(options: PlayerFacadeOptions = {}): Promise<MprisFacade> {
    const facade = create(options);
    await facade.probe();
    return facade;
  }

  describe('probe', function () {
    it('should build a canonical snapshot', async function () {
      const facade = await probed();

      expect(facade.snapshot()).to.deep.equal({
        id: SPOTIFY,
        name: 'Spotify',
        playbackState: 'playing',
        metadata: {
          title: 'Lullaby',
          artist: 'First Band, Second Band',
          length: 180,
          trackId: '/org/example/track/1',
        },
        position: 5,
        rate: 1,
        capabilities: ['play', 'pause', 'stop', 'next', 'seek', 'set-rate'],
        status: 'ok',
        facade: 'mpris',
      });
    });

    it('should fall back to the bus name suffix without an identity', async function () {
      state.root = {};
      const facade = await probed();
      expect(facade.identity).to.equal('spotify');
    });

    it('should prefer the desktop entry over the bus name', async function () {
      state.root = { DesktopEntry: 'spotify-client' };
      const facade = await probed();
      expect(facade.identity).to.equal('spotify-client');
    });

    it('should report no capabilities when the player cannot be controlled', async function () {
      state.player = { ...fullPlayer(), CanControl: false };
      const facade = await probed();
      expect(facade.snapshot().capabilities).to.deep.equal([]);
    });

    it('should wrap bus failures in PlayerProbeError', async function () {
      state.failingProbes = 1;
      const facade = create();
      const error = await rejectionOf(facade.probe());
      expect(error).to.be.instanceOf(PlayerProbeError);
    });

    it('should give up on a player that never answers', async function () {
      state.gate = new Promise<void>(() => {});
      const error = await rejectionOf(create({ callTimeoutMs: 20 }).probe());
      expect(error).to.be.instanceOf(PlayerProbeError);
      expect(error.message).to.include('did not answer GetAll within 20ms');
    });

    it('should report no capabilities once degraded', async function () {
      const facade = await probed();
      facade.markDegraded('probe timed out');
      expect(facade.snapshot().status).to.equal('degraded');
      expect(facade.snapshot().capabilities).to.deep.equal([]);
    });
  });

  describe('change notifications', function () {
    it('should emit only when the snapshot differs', async function () {
      const facade = await probed();
      const seen: PlayerSnapshot[] = [];
      facade.on('change', (snapshot) => seen.push(snapshot));

      state.emitPropertiesChanged({ PlaybackStatus: 'Playing' });
      state.emitPropertiesChanged({ PlaybackStatus: 'Paused' });

      expect(seen).to.have.lengthOf(1);
      expect(seen[0]?.playbackState).to.equal('paused');
    });

    it('should ignore changes on other interfaces', async function () {
      const facade = await probed();
      let changes = 0;
      facade.on('change', () => changes++);

      state.emitPropertiesChanged({ Identity: 'Renamed' }, [], MPRIS_ROOT_INTERFACE);

      expect(changes).to.equal(0);
      expect(facade.snapshot().name).to.equal('Spotify');
    });

    it('should treat invalidated properties as stopped and incapable', async function () {
      const facade = await probed();

      state.emitPropertiesChanged({}, ['PlaybackStatus', 'CanPlay', 'Metadata']);

      const snapshot = facade.snapshot();
      expect(snapshot.playbackState).to.equal('stopped');
      expect(snapshot.metadata).to.deep.equal({});
      expect(snapshot.capabilities).to.deep.equal([
        'pause',
        'stop',
        'next',
        'seek',
        'set-rate',
      ]);
    });

    it('should follow Seeked signals', async function () {
      const facade = await probed();
      state.emitSignal(MPRIS_PLAYER_INTERFACE, 'Seeked', 42_000_000n);
      expect(facade.snapshot().position).to.equal(42);
    });

    it('should re-read all properties after a change notification', async function () {
      const facade = await probed({ refreshDelayMs: 5 });
      state.player = { ...state.player, CanSeek: false };
      state.emitPropertiesChanged({ PlaybackStatus: 'Paused' });

      expect(facade.snapshot().capabilities).to.include('seek');
      await waitFor(() => !facade.snapshot().capabilities.includes('seek'));
      expect(facade.snapshot().playbackState).to.equal('paused');
    });

    it('should not re-read properties after being disposed', async function () {
      const facade = await probed({ refreshDelayMs: 5 });
      const reads = state.getAllCount;
      state.emitPropertiesChanged({ PlaybackStatus: 'Paused' });
      facade.dispose();

      await new Promise((resolve) => setTimeout(resolve, 30));
      await flush();
      expect(state.getAllCount).to.equal(reads);
    });

    it('should stop listening once disposed', async function () {
      const facade = await probed();
      let changes = 0;
      facade.on('change', () => changes++);

      facade.dispose();
      state.emitPropertiesChanged({ PlaybackStatus: 'Paused' });

      expect(changes).to.equal(0);
      expect(state.listenerCount).to.equal(0);
    });
  });

  describe('execute', function () {
    it('should call the matching player method', async function () {
      const facade = await probed();
      await facade.execute({ action: 'pause' });
      expect(state.calls).to.deep.equal([
        { interfaceName: MPRIS_PLAYER_INTERFACE, method: 'Pause', args: [] },
      ]);
    });

    it('should reject commands outside the capabilities', async function () {
      const facade = await probed();
      const error = await rejectionOf(facade.execute({ action: 'previous' }));
      expect(error).to.be.instanceOf(CommandRejectedError);
      expect(error).to.have.property('reason', 'unsupported');
      expect(state.calls).to.be.empty;
    });

    it('should seek with SetPosition and clamp to the track length', async function () {
      const facade = await probed();
      await facade.execute({ action: 'seek', position: 200 });

      expect(state.calls).to.deep.equal([
        {
          interfaceName: MPRIS_PLAYER_INTERFACE,
          method: 'SetPosition',
          args: ['/org/example/track/1', 180_000_000n],
        },
      ]);
      expect(facade.snapshot().position).to.equal(180);
    });

    it('should clamp negative seek targets to zero', async function () {
      const facade = await probed();
      await facade.execute({ action: 'seek', position: -10 });
      expect(state.calls[0]?.args).to.deep.equal(['/org/example/track/1', 0n]);
    });

    it('should change the rate within the advertised range', async function () {
      const facade = await probed();
      await facade.execute({ action: 'set-rate', rate: 1.5 });

      expect(state.propertyWrites).to.deep.equal([
        { name: 'Rate', signature: 'd', value: 1.5 },
      ]);
      expect(facade.snapshot().rate).to.equal(1.5);
    });

    it('should reject rates outside the advertised range', async function () {
      const facade = await probed();
      const error = await rejectionOf(facade.execute({ action: 'set-rate', rate: 4 }));
      expect(error).to.have.property('reason', 'unsupported');
      expect(state.propertyWrites).to.be.empty;
    });

    it('should report bus failures as failed', async function () {
      const facade = await probed();
      state.failCalls = true;
      const error = await rejectionOf(facade.execute({ action: 'play' }));
      expect(error).to.have.property('reason', 'failed');
    });

    it('should fail a command the player leaves unanswered and carry on', async function () {
      const facade = await probed({ callTimeoutMs: 20 });
      state.callGate = new Promise<void>(() => {});

      const error = await rejectionOf(facade.execute({ action: 'play' }));
      expect(error).to.be.instanceOf(CommandRejectedError);
      expect(error).to.have.property('reason', 'failed');

      state.callGate = null;
      await facade.execute({ action: 'pause' });
      expect(state.calls.map(({ method }) => method)).to.deep.equal(['Pause']);
    });

    it('should reject commands to a disposed player as not found', async function () {
      const facade = await probed();
      facade.dispose();
      const error = await rejectionOf(facade.execute({ action: 'play' }));
      expect(error).to.have.property('reason', 'not-found');
    });

    it('should answer player-busy once the queue is full', async function () {
      const facade = await probed();
      const gate = deferred();
      state.callGate = gate.promise;

      const accepted = Array.from({ length: MAX_PENDING_COMMANDS }, () =>
        facade.execute({ action: 'next' }),
      );
      const error = await rejectionOf(facade.execute({ action: 'next' }));
      expect(error).to.have.property('reason', 'player-busy');

      gate.resolve();
      await Promise.all(accepted);
      expect(state.calls).to.have.lengthOf(MAX_PENDING_COMMANDS);
    });

    it('should apply queued commands in order', async function () {
      const facade = await probed();
      await Promise.all([
        facade.execute({ action: 'pause' }),
        facade.execute({ action: 'play' }),
        facade.execute({ action: 'next' }),
      ]);
      expect(state.calls.map(({ method }) => method)).to.deep.equal([
        'Pause',
        'Play',
        'Next',
      ]);
    });
  });
});

describe('ChromiumFacade', function () {
  let state: FakePlayer;
  let facade: ChromiumFacade;

  beforeEach(async function () {
    state = new FakePlayer({
      root: { Identity: 'Chromium' },
      player: {
        ...fullPlayer(),
        Metadata: {
          'xesam:title': 'Video',
          'mpris:length': 60_000_000n,
          'mpris:trackid': '/org/chromium/MediaPlayer2/TrackList/NoTrack',
        },
      },
    });
    facade = new ChromiumFacade(CHROMIUM, new FakeMediaBus({ [CHROMIUM]: state }));
    await facade.probe();
  });

  afterEach(function () {
    facade.dispose();
  });

  it('should supply its own introspection document', function () {
    expect(state.introspectionXml).to.include(
      '<interface name="org.mpris.MediaPlayer2.Player">',
    );
  });

  it('should never offer rate control', function () {
    expect(facade.snapshot().capabilities).to.not.include('set-rate');
  });

  it('should seek relative to the current position without a real track', async function () {
    await facade.execute({ action: 'seek', position: 30 });
    expect(state.calls).to.deep.equal([
      { interfaceName: MPRIS_PLAYER_INTERFACE, method: 'Seek', args: [25_000_000n] },
    ]);
    expect(facade.snapshot().position).to.equal(30);
  });
});

describe('VlcFacade', function () {
  let state: FakePlayer;
  let facade: VlcFacade;

  beforeEach(async function () {
    state = new FakePlayer({ root: { Identity: 'VLC media player' }, player: fullPlayer() });
    facade = new VlcFacade(VLC, new FakeMediaBus({ [VLC]: state }));
    await facade.probe();
  });

  afterEach(function () {
    facade.dispose();
  });

  it('should declare the track list interface', function () {
    expect(state.introspectionXml).to.include(
      '<interface name="org.mpris.MediaPlayer2.TrackList">',
    );
  });

});

describe('selectFacade', function () {
  it('should pick the chromium variant for browsers', function () {
    expect(selectFacade(CHROMIUM)).to.equal('chromium');
    expect(selectFacade('org.mpris.MediaPlayer2.Brave.instance1')).to.equal('chromium');
    expect(selectFacade('org.mpris.MediaPlayer2.chrome')).to.equal('chromium');
  });

  it('should pick the vlc variant for VLC', function () {
    expect(selectFacade(VLC)).to.equal('vlc');
  });

  it('should default to the plain variant', function () {
    expect(selectFacade(SPOTIFY)).to.equal('mpris');
    expect(selectFacade('org.example.NotAPlayer')).to.equal('mpris');
  });

  it('should build the selected variant', function () {
    const bus = new FakeMediaBus();
    expect(createFacade(VLC, bus)).to.be.instanceOf(VlcFacade);
    expect(createFacade(CHROMIUM, bus)).to.be.instanceOf(ChromiumFacade);
    expect(createFacade(SPOTIFY, bus)).to.be.instanceOf(MprisFacade);
  });
});
