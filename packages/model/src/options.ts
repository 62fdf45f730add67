/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Display options. Serialized as the `meta` object of a resource.
 */

import { TypedField } from './field.js';
import { choiceType, colorType, numberType } from './field-types.js';
import type { Rgb } from './field-types.js';
import { PropertyObject } from './property-object.js';

export interface OptionsInit {
  opacity?: number;
}

export interface ColorOptionsInit extends OptionsInit {
  color?: Rgb | string;
}

export class Options extends PropertyObject {
  readonly opacity = new TypedField('opacity', numberType({ min: 0, max: 1 }), {
    doc: 'Opacity between 0 (transparent) and 1 (opaque)',
    default: () => 1,
  });

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.opacity];
  }
}

export class ColorOptions extends Options {
  readonly color = new TypedField('color', colorType(), { doc: 'Solid color' });

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.color];
  }
}

// ============================================================================
// Mesh options
// ============================================================================

export type LineViewType = 'line' | 'tube';

export interface LineMeshOptionsInit extends OptionsInit {
  viewType?: LineViewType | string;
}

export class LineMeshOptions extends Options {
  readonly viewType = new TypedField(
    'viewType',
    choiceType<LineViewType>({
      line: ['lines', 'thin', '1d'],
      tube: ['tubes', 'extruded line', 'extruded lines', 'borehole', 'boreholes'],
    }),
    { doc: 'Display 1D lines or tubes/boreholes/extruded lines', default: () => 'line' }
  );

  constructor(init: LineMeshOptionsInit = {}) {
    super();
    this.update(init);
  }

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.viewType];
  }
}

export class PointMeshOptions extends Options {
  constructor(init: OptionsInit = {}) {
    super();
    this.update(init);
  }
}

// ============================================================================
// Resource options
// ============================================================================

export class LineOptions extends ColorOptions {
  constructor(init: ColorOptionsInit = {}) {
    super();
    this.update(init);
  }
}

export class PointOptions extends ColorOptions {
  constructor(init: ColorOptionsInit = {}) {
    super();
    this.update(init);
  }
}
