import * as THREE from "three";
import { HALF_PI, TAU } from "../constants";
import type { Vec3 } from "../types/grid-types";

/**
 * Convert (lat, lon) in radians to (x, y, z) on a sphere of given radius.
 * Y-up convention: Y = north pole, longitude 0 on +Z, longitude π/2 on +X.
 */
export function latLonToPosition(latitude: number, longitude: number, radius: number): Vec3 {
  const v = new THREE.Vector3().setFromSphericalCoords(radius, HALF_PI - latitude, longitude);
  return [v.x, v.y, v.z];
}

/**
 * Latitude and longitude (radians) of the direction from the origin to
 * `position`. Longitude is reduced to [0, 2π). The origin maps to (0, 0).
 */
export function positionToLatLon(position: Vec3): { latitude: number; longitude: number } {
  const v = new THREE.Vector3(...position);
  const length = v.length();
  if (length === 0) return { latitude: 0, longitude: 0 };

  const latitude = Math.asin(THREE.MathUtils.clamp(v.y / length, -1, 1));
  const longitude = THREE.MathUtils.euclideanModulo(Math.atan2(v.x, v.z), TAU);
  return { latitude, longitude };
}

/**
 * Bring geographic coordinates into range: a latitude past a pole is folded
 * back over it (which moves the point to the antipodal meridian), and the
 * longitude is reduced to [0, 2π).
 *
 * Latitudes outside [-π/2, π/2] do not name a physical point; folding is a
 * best-effort reading of them.
 */
export function foldGeographic(latitude: number, longitude: number): [number, number] {
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new Error(`Geographic coordinates must be finite, got (${latitude}, ${longitude})`);
  }

  let lat = latitude;
  let lon = longitude;
  if (lat > Math.PI || lat < -Math.PI) {
    lat = THREE.MathUtils.euclideanModulo(lat + Math.PI, TAU) - Math.PI;
  }
  if (lat > HALF_PI) {
    lat = Math.PI - lat;
    lon += Math.PI;
  } else if (lat < -HALF_PI) {
    lat = -Math.PI - lat;
    lon += Math.PI;
  }

  return [lat, THREE.MathUtils.euclideanModulo(lon, TAU)];
}
