/**
 * Volume hook invoked after every successful design-file swap.
 */
export interface VolumeEstimator {
    /**
     * Computes the printable volume of a design file.
     * @param filePath string - Active design file (.stl / .obj)
     * @returns Promise<number> - Volume in cubic units
     */
    Estimate(filePath: string): Promise<number>;
}

/** Default estimator: geometry is not parsed yet, every file reports 0. */
export class PlaceholderVolumeEstimator implements VolumeEstimator {
    // TODO: parse STL/OBJ meshes and sum signed tetrahedron volumes
    public async Estimate(_filePath: string): Promise<number> {
        return 0;
    }
}

export const PLACEHOLDER_VOLUME_ESTIMATOR: VolumeEstimator = new PlaceholderVolumeEstimator();
