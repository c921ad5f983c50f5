import multer from 'multer';

export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

const JSON_MIME_TYPES = new Set(['application/json', 'text/json']);

// Geometry documents are parsed straight from the buffer, nothing touches disk
export const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: MAX_UPLOAD_BYTES,
    files: 1,
  },
  fileFilter: (req, file, cb) => {
    if (JSON_MIME_TYPES.has(file.mimetype) || file.originalname.toLowerCase().endsWith('.json')) {
      cb(null, true);
    } else {
      cb(new multer.MulterError('LIMIT_UNEXPECTED_FILE', file.fieldname));
    }
  },
});
