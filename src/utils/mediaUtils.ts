// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
export const readFileAsDataUrl = (file: Blob): Promise<string> =>
  new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      if (typeof reader.result === 'string') resolve(reader.result);
      else reject(new Error('File could not be read as a data URL'));
    };
    reader.onerror = () => reject(reader.error ?? new Error('File read failed'));
    reader.readAsDataURL(file);
  });

export const isImageFile = (file: File): boolean => file.type.startsWith('image/');
