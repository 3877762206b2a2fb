// Spoken notices, one per failure category. Raw error text is never spoken.

import type { NoticeCategory } from '@glimpse/contracts';

export const NOTICE_TEXT: Readonly<Record<NoticeCategory, string>> = {
    DeviceUnavailable: '摄像头现在无法使用',
    CaptureFailed: '拍照失败了，请再试一次',
    network: '视觉服务连接失败',
    timeout: '视觉服务响应超时',
    malformedResponse: '视觉服务返回的结果无法识别',
    cancelled: '已取消',
    SynthesisFailed: '语音播放失败',
    ConnectionLost: '与服务器的连接已断开',
    VisionDisabled: '视觉功能没有开启',
};
