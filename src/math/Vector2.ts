/**
 * 2D vector backing entity position and velocity.
 * Mutating methods return `this`. Screen space: x grows right, y grows down.
 */
export class Vector2 {
  constructor(
    public x: number = 0,
    public y: number = 0
  ) {}

  scale(scalar: number): this {
    this.x *= scalar
    this.y *= scalar
    return this
  }

  lengthSquared(): number {
    return this.x * this.x + this.y * this.y
  }

  length(): number {
    return Math.sqrt(this.lengthSquared())
  }

  /** Shrink to `maxLength` when longer, keep direction */
  limit(maxLength: number): this {
    const lenSq = this.lengthSquared()
    if (lenSq > maxLength * maxLength) {
      this.scale(maxLength / Math.sqrt(lenSq))
    }
    return this
  }

  distanceSquaredTo(other: Vector2): number {
    const dx = other.x - this.x
    const dy = other.y - this.y
    return dx * dx + dy * dy
  }
}

/**
 * Wrap an angle into (-PI, PI]
 */
export function normalizeAngle(angle: number): number {
  let result = angle % (Math.PI * 2)
  if (result > Math.PI) result -= Math.PI * 2
  if (result <= -Math.PI) result += Math.PI * 2
  return result
}

export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value
}
