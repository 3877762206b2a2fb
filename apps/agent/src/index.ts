// Local Agent Entry Point
// Voice client with an on-demand camera vision detour

export { KeywordMatcher, normalizeText, selectPrompt } from './intent/KeywordMatcher.js';
export { CameraController } from './camera/CameraController.js';
export { FfmpegCameraDriver } from './camera/FfmpegCameraDriver.js';
export { VisionAnalyzer, visionFailure } from './vision/VisionAnalyzer.js';
export { CommandSpeechSynthesizer } from './speech/SpeechSynthesizer.js';
export { SpeechPlayer } from './speech/SpeechPlayer.js';
export { CommandAudioOutput } from './audio/AudioOutput.js';
export { CommandMicrophone } from './audio/AudioCapture.js';
export { PcmFramer, WavFrameReader } from './audio/pcm.js';
export { WebsocketProtocol } from './protocol/WebsocketProtocol.js';
export { SessionStateMachine } from './session/SessionStateMachine.js';
export { EventScheduler } from './session/EventScheduler.js';
export { VoiceSession, extractActivationCode } from './session/VoiceSession.js';
export { createControlApp, startControlServer, stopControlServer } from './control/controlServer.js';
export { loadConfig, loadVisionFile } from './config/index.js';
export * from './utils/errors.js';

// Re-export types
export * from './intent/IntentTypes.js';
export type { CameraDriver, CameraHandle } from './camera/CameraController.js';
export type { ImageAnalyzer } from './vision/VisionAnalyzer.js';
export type { SpeechSynthesizer } from './speech/SpeechSynthesizer.js';
export type { AudioOutput, AudioSink } from './audio/AudioOutput.js';
export type { Microphone } from './audio/AudioCapture.js';
export type { AudioFrame, PcmFormat } from './audio/pcm.js';
export type { ProtocolClient, ProtocolEvents } from './protocol/ProtocolClient.js';
export type { VoiceSessionDeps } from './session/VoiceSession.js';
export type { ControlTarget } from './control/controlServer.js';
export type { AgentConfig } from './config/index.js';
