import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  decodeMessage,
  decodeRecognitionResult,
  describeServerError,
  encodeMessage,
} from '../src/protocol/codec.js';
import { isKnownMessageType } from '../src/protocol/messages.js';

const AT = new Date('2024-03-01T12:00:00.000Z');

describe('message codec', () => {
  describe('encodeMessage', () => {
    it('should write type, data and an ISO timestamp', () => {
      assert.strictEqual(
        encodeMessage('control', { action: 'start' }, AT),
        '{"type":"control","data":{"action":"start"},"timestamp":"2024-03-01T12:00:00.000Z"}'
      );
    });

    it('should leave out undefined data', () => {
      assert.strictEqual(encodeMessage('ping', undefined, AT), '{"type":"ping","timestamp":"2024-03-01T12:00:00.000Z"}');
    });

    it('should keep null data', () => {
      assert.strictEqual(encodeMessage('ping', null, AT), '{"type":"ping","data":null,"timestamp":"2024-03-01T12:00:00.000Z"}');
    });
  });

  describe('decodeMessage', () => {
    it('should read an envelope and lowercase its type', () => {
      const result = decodeMessage('{"type":" PONG ","data":{"n":1},"timestamp":"2024-03-01T12:00:00Z"}');
      assert.deepStrictEqual(result, {
        ok: true,
        message: { type: 'pong', data: { n: 1 }, timestamp: '2024-03-01T12:00:00Z' },
      });
    });

    it('should drop a non-string timestamp', () => {
      const result = decodeMessage('{"type":"ping","timestamp":12}');
      assert.deepStrictEqual(result, { ok: true, message: { type: 'ping' } });
    });

    it('should classify malformed frames', () => {
      assert.deepStrictEqual(decodeMessage('not json'), { ok: false, reason: 'invalid_json' });
      assert.deepStrictEqual(decodeMessage('[1,2]'), { ok: false, reason: 'not_an_object' });
      assert.deepStrictEqual(decodeMessage('"ping"'), { ok: false, reason: 'not_an_object' });
      assert.deepStrictEqual(decodeMessage('{"data":1}'), { ok: false, reason: 'missing_type' });
      assert.deepStrictEqual(decodeMessage('{"type":"  "}'), { ok: false, reason: 'missing_type' });
    });

    it('should read back what it writes', () => {
      const result = decodeMessage(encodeMessage('error', { message: 'boom' }, AT));
      assert.deepStrictEqual(result, {
        ok: true,
        message: { type: 'error', data: { message: 'boom' }, timestamp: '2024-03-01T12:00:00.000Z' },
      });
    });
  });

  describe('decodeRecognitionResult', () => {
    const payload = {
      speaker_id: 'spk-7',
      speaker_name: 'Ada',
      confidence: 91.25,
      timestamp: '2024-03-01T12:00:01Z',
      audio_duration: 1.5,
      processing_time: 0.2,
      features: {
        mfcc_features: [1.5, -2, 0.25],
        energy_level: 0.8,
        voice_activity: true,
        frequency_stats: {
          fundamental_frequency: 180,
          spectral_centroid: 1200,
          spectral_bandwidth: 800,
          spectral_rolloff: 3000,
        },
      },
    };

    it('should map the wire payload', () => {
      assert.deepStrictEqual(decodeRecognitionResult(payload), {
        speakerId: 'spk-7',
        speakerName: 'Ada',
        confidence: 91.25,
        timestamp: '2024-03-01T12:00:01Z',
        audioDuration: 1.5,
        processingTime: 0.2,
        features: {
          mfccFeatures: [1.5, -2, 0.25],
          energyLevel: 0.8,
          voiceActivity: true,
          frequencyStats: {
            fundamentalFrequency: 180,
            spectralCentroid: 1200,
            spectralBandwidth: 800,
            spectralRolloff: 3000,
          },
        },
      });
    });

    it('should accept the payload as a JSON string', () => {
      assert.strictEqual(decodeRecognitionResult(JSON.stringify(payload))?.speakerName, 'Ada');
    });

    it('should clamp confidence into 0..100', () => {
      assert.strictEqual(decodeRecognitionResult({ speaker_id: 'a', confidence: 140 })?.confidence, 100);
      assert.strictEqual(decodeRecognitionResult({ speaker_id: 'a', confidence: -3 })?.confidence, 0);
    });

    it('should default missing numbers and skip bad features', () => {
      assert.deepStrictEqual(
        decodeRecognitionResult({ speaker_name: 'Ada', features: { mfcc_features: [1, 'x'] } }),
        {
          speakerId: '',
          speakerName: 'Ada',
          confidence: 0,
          timestamp: '',
          audioDuration: 0,
          processingTime: 0,
          features: { energyLevel: 0, voiceActivity: false },
        }
      );
    });

    it('should accept numeric speaker ids', () => {
      assert.strictEqual(decodeRecognitionResult({ speaker_id: 3, speaker_name: 'Alice' })?.speakerId, '3');
      const anonymous = decodeRecognitionResult({ speaker_id: 7 });
      assert.notStrictEqual(anonymous, null);
      assert.strictEqual(anonymous?.speakerId, '7');
      assert.strictEqual(anonymous?.speakerName, '');
    });

    it('should reject payloads without a speaker', () => {
      assert.strictEqual(decodeRecognitionResult({ confidence: 50 }), null);
      assert.strictEqual(decodeRecognitionResult('not json'), null);
      assert.strictEqual(decodeRecognitionResult(42), null);
    });
  });

  describe('describeServerError', () => {
    it('should read strings, message and error fields', () => {
      assert.strictEqual(describeServerError('Model not loaded'), 'Model not loaded');
      assert.strictEqual(describeServerError({ message: 'Busy' }), 'Busy');
      assert.strictEqual(describeServerError({ error: 'Bad frame' }), 'Bad frame');
      assert.strictEqual(describeServerError(''), 'Unknown error');
      assert.strictEqual(describeServerError(undefined), 'Unknown error');
    });
  });

  it('should know the four handled message types', () => {
    assert.strictEqual(isKnownMessageType('recognition_result'), true);
    assert.strictEqual(isKnownMessageType('status'), false);
  });
});
