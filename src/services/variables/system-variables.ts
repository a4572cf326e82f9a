// Values every template can reference without declaring them

export const GENERATOR_NAME = 'scaffold';
export const GENERATOR_VERSION = '0.1.0';

export const SYSTEM_VARIABLE_NAMES = [
  'current_year',
  'current_date',
  'generator_name',
  'generator_version',
  'license_text'
] as const;
export type SystemVariableName = typeof SYSTEM_VARIABLE_NAMES[number];

export interface LicenseDetails {
  year: number;
  author: string;
}

/**
 * Supplies the full text of a license by identifier
 */
export interface LicenseProvider {
  /** Null when the license is unknown */
  getText(license: string, details: LicenseDetails): string | null;
}

const LICENSE_TEXTS: Record<string, string> = {
  'MIT': `MIT License

Copyright (c) {year} {author}

Permission is hereby granted, free of charge, to any person obtaining a copy
of this software and associated documentation files (the "Software"), to deal
in the Software without restriction, including without limitation the rights
to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
copies of the Software, and to permit persons to whom the Software is
furnished to do so, subject to the following conditions:

The above copyright notice and this permission notice shall be included in all
copies or substantial portions of the Software.

THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT.
`,
  'Apache-2.0': `Copyright {year} {author}

Licensed under the Apache License, Version 2.0 (the "License");
you may not use this file except in compliance with the License.
You may obtain a copy of the License at

    http://www.apache.org/licenses/LICENSE-2.0

Unless required by applicable law or agreed to in writing, software
distributed under the License is distributed on an "AS IS" BASIS,
WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
See the License for the specific language governing permissions and
limitations under the License.
`,
  'BSD-3-Clause': `BSD 3-Clause License

Copyright (c) {year}, {author}

Redistribution and use in source and binary forms, with or without
modification, are permitted provided that the following conditions are met:

1. Redistributions of source code must retain the above copyright notice, this
   list of conditions and the following disclaimer.

2. Redistributions in binary form must reproduce the above copyright notice,
   this list of conditions and the following disclaimer in the documentation
   and/or other materials provided with the distribution.

3. Neither the name of the copyright holder nor the names of its
   contributors may be used to endorse or promote products derived from
   this software without specific prior written permission.
`,
  'Unlicense': `This is free and unencumbered software released into the public domain.

Anyone is free to copy, modify, publish, use, compile, sell, or
distribute this software, either in source code form or as a compiled
binary, for any purpose, commercial or non-commercial, and by any means.

For more information, please refer to <https://unlicense.org>
`
};

/**
 * Short texts for common licenses, with {year} and {author} filled in
 */
export class BuiltinLicenseProvider implements LicenseProvider {
  getText(license: string, details: LicenseDetails): string | null {
    const text = LICENSE_TEXTS[license];
    if (text === undefined) {
      return null;
    }
    return text.replace(/\{year\}/g, String(details.year)).replace(/\{author\}/g, details.author);
  }
}

export interface SystemVariableOptions {
  now?: Date;
  license?: string;
  author?: string;
  licenseProvider?: LicenseProvider;
}

/**
 * Builds the system variable map. `license_text` is empty for unknown licenses.
 */
export function systemVariables(options: SystemVariableOptions = {}): Readonly<Record<SystemVariableName, string | number>> {
  const now = options.now ?? new Date();
  const year = now.getFullYear();
  const provider = options.licenseProvider ?? new BuiltinLicenseProvider();
  const licenseText = options.license
    ? provider.getText(options.license, { year, author: options.author ?? '' })
    : null;

  return Object.freeze({
    current_year: year,
    current_date: formatDate(now),
    generator_name: GENERATOR_NAME,
    generator_version: GENERATOR_VERSION,
    license_text: licenseText ?? ''
  });
}

function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function isSystemVariable(name: string): boolean {
  return SYSTEM_VARIABLE_NAMES.some(candidate => candidate === name);
}
