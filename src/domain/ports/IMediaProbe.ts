/**
 * Facts read from a media file's container.
 */
export interface MediaInfo {
    durationSeconds: number;
    /** Present for files with a video stream (stills included) */
    width?: number;
    height?: number;
    hasVideo: boolean;
    hasAudio: boolean;
}

/**
 * IMediaProbe - Port for reading media metadata.
 * Implementations: FFprobeMediaProbe
 */
export interface IMediaProbe {
    probe(filePath: string): Promise<MediaInfo>;
}
